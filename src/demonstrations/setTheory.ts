import { format } from '../i18n';
import { checkEqual, Demonstration } from '../runner';
import { activeFeatures, FeatureName, FeatureToggle } from '../techniques/featureCombination';

const CASES: ReadonlyArray<[FeatureToggle, FeatureName[]]> = [
  [{ featureA: true, featureB: true, featureC: false }, ['A', 'B']],
  [{ featureA: true, featureB: false, featureC: true }, ['A', 'C']],
  [{ featureA: false, featureB: true, featureC: true }, ['B', 'C']],
  [{ featureA: true, featureB: true, featureC: true }, ['A', 'B', 'C']],
];

export const setTheory: Demonstration = {
  id: 'setTheory',
  run({ messages, narrate }) {
    for (const [toggle, expected] of CASES) {
      const features = activeFeatures(toggle);
      for (const name of features) {
        narrate(format(messages.feature, { name }));
      }
      narrate(messages.featureDivider);
      checkEqual(features, expected, `activeFeatures(${JSON.stringify(toggle)})`);
    }
    narrate(messages.passed.setTheory);
  },
};
