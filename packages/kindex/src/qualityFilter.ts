import type { ComponentLabel, Sample } from './types';

export const DEFAULT_MAX_ABS_SCORE = 2.5;

// Standard deviations at or below this are treated as zero variance.
const MIN_STD = 1e-9;

export interface QualityFilterOptions {
  maxAbsScore?: number;
}

export interface ComponentStats {
  mean: number;
  std: number;
}

const readValue = (sample: Sample, label: ComponentLabel): number | null => {
  const value = sample.values[label];
  return value === undefined || value === null || Number.isNaN(value) ? null : value;
};

const computeStats = (samples: readonly Sample[], label: ComponentLabel): ComponentStats | null => {
  const values: number[] = [];
  for (const sample of samples) {
    const value = readValue(sample, label);
    if (value !== null) {
      values.push(value);
    }
  }
  if (values.length < 2) {
    return null;
  }

  const mean = values.reduce((sum, value) => sum + value, 0) / values.length;
  const variance = values.reduce((sum, value) => sum + (value - mean) ** 2, 0) / values.length;
  const std = Math.sqrt(variance);
  return std > MIN_STD ? { mean, std } : null;
};

/**
 * Standard score of one sample's component, `0` when the component has no variance across the
 * batch, and `null` when the reading is missing from a component that does vary.
 */
export const standardScore = (
  sample: Sample,
  label: ComponentLabel,
  stats: ComponentStats | null
): number | null => {
  if (!stats) {
    return 0;
  }
  const value = readValue(sample, label);
  return value === null ? null : (value - stats.mean) / stats.std;
};

/**
 * Keeps the samples whose every selected component lies within `maxAbsScore` standard deviations
 * of the batch mean. The result is an order-preserving subsequence of `samples`.
 */
export const filterOutliers = (
  samples: readonly Sample[],
  components: readonly ComponentLabel[],
  options: QualityFilterOptions = {}
): Sample[] => {
  if (samples.length === 0) {
    return [];
  }

  const maxAbsScore = options.maxAbsScore ?? DEFAULT_MAX_ABS_SCORE;
  const stats = components.map((label) => ({ label, stats: computeStats(samples, label) }));

  return samples.filter((sample) =>
    stats.every(({ label, stats: componentStats }) => {
      const score = standardScore(sample, label, componentStats);
      return score !== null && Math.abs(score) <= maxAbsScore;
    })
  );
};
