import { Demonstration } from '../runner';

import { boundary } from './boundary';
import { combinatorial } from './combinatorial';
import { equivalence } from './equivalence';
import { factorial } from './factorial';
import { fibonacci } from './fibonacci';
import { ordering } from './ordering';
import { primes } from './primes';
import { reachability } from './reachability';
import { setTheory } from './setTheory';
import { venn } from './venn';

/** Run order of the console program. */
export const DEMONSTRATIONS: readonly Demonstration[] = [
  setTheory,
  equivalence,
  reachability,
  boundary,
  combinatorial,
  ordering,
  venn,
  factorial,
  fibonacci,
  primes,
];

export {
  boundary,
  combinatorial,
  equivalence,
  factorial,
  fibonacci,
  ordering,
  primes,
  reachability,
  setTheory,
  venn,
};
