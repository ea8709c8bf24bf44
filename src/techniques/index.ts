export * from './status';
export * from './featureCombination';
export * from './equivalence';
export * from './coverage';
export * from './boundary';
export * from './combinatorial';
export * from './ordering';
export * from './classification';
