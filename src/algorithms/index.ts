export * from './errors';
export * from './factorial';
export * from './fibonacci';
export * from './primality';
