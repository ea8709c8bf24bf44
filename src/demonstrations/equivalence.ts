import { checkEqual, Demonstration } from '../runner';
import { processValue } from '../techniques/equivalence';
import { Status } from '../techniques/status';

// One representative per class: negative, zero, positive.
const CASES: ReadonlyArray<[number, Status]> = [
  [-5, 'failure'],
  [0, 'success'],
  [10, 'success'],
];

export const equivalence: Demonstration = {
  id: 'equivalence',
  run({ messages, narrate }) {
    for (const [value, expected] of CASES) {
      checkEqual(processValue(value), expected, `processValue(${value})`);
    }
    narrate(messages.passed.equivalence);
  },
};
