import { checkEqual, Demonstration } from '../runner';
import { classifyNumber, NumberClass } from '../techniques/classification';

const CASES: ReadonlyArray<[number, NumberClass]> = [
  [2, 'positive-even'],
  [1, 'positive-odd'],
  [-2, 'negative-even'],
  [-1, 'negative-odd'],
  [0, 'unclassified'],
];

export const venn: Demonstration = {
  id: 'venn',
  run({ messages, narrate }) {
    for (const [value, expected] of CASES) {
      checkEqual(
        classifyNumber(value, messages.numberClass),
        messages.numberClass[expected],
        `classifyNumber(${value})`,
      );
    }
    narrate(messages.passed.venn);
  },
};
