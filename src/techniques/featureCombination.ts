/**
* Set-theory framing of feature testing: every test run exercises one subset
* of the feature set {A, B, C}.
*/

export type FeatureName = 'A' | 'B' | 'C';

export interface FeatureToggle {
  featureA: boolean;
  featureB: boolean;
  featureC: boolean;
}

/** Names of the enabled features, always in A, B, C order. */
export function activeFeatures(toggle: FeatureToggle): FeatureName[] {
  const out: FeatureName[] = [];
  if (toggle.featureA) out.push('A');
  if (toggle.featureB) out.push('B');
  if (toggle.featureC) out.push('C');
  return out;
}

/**
* All 2³ toggles, from every feature off to every feature on. Feature A is the
* most significant bit.
*/
export function featureCombinations(): FeatureToggle[] {
  const out: FeatureToggle[] = [];
  for (let mask = 0; mask < 8; mask++) {
    out.push({
      featureA: (mask & 4) !== 0,
      featureB: (mask & 2) !== 0,
      featureC: (mask & 1) !== 0,
    });
  }
  return out;
}
