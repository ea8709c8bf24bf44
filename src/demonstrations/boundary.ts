import { checkEqual, Demonstration } from '../runner';
import { checkRange } from '../techniques/boundary';
import { Status } from '../techniques/status';

const CASES: ReadonlyArray<[number, Status]> = [
  // Lower and upper limits
  [1, 'success'],
  [100, 'success'],
  // Just outside
  [0, 'failure'],
  [101, 'failure'],
];

export const boundary: Demonstration = {
  id: 'boundary',
  run({ messages, narrate }) {
    for (const [value, expected] of CASES) {
      checkEqual(checkRange(value), expected, `checkRange(${value})`);
    }
    narrate(messages.passed.boundary);
  },
};
