import { checkEqual, Demonstration } from '../runner';
import { isSorted } from '../techniques/ordering';

export const ordering: Demonstration = {
  id: 'ordering',
  run({ messages, narrate }) {
    const sortedArray = [1, 2, 3, 4, 5];
    const unsortedArray = [5, 3, 1];

    checkEqual(isSorted(sortedArray), true, `isSorted(${JSON.stringify(sortedArray)})`);
    checkEqual(isSorted(unsortedArray), false, `isSorted(${JSON.stringify(unsortedArray)})`);

    narrate(messages.passed.ordering);
  },
};
