import { CalibrationError } from './errors';
import type { KIndexValue } from './types';

/** Lower bounds of K = 0..9 for a station whose K9 limit is 500 nT. */
export const BASE_THRESHOLDS: readonly number[] = [0, 5, 10, 20, 40, 70, 120, 200, 330, 500];

const REFERENCE_K9_LIMIT = 500;
const K_LEVELS: readonly KIndexValue[] = [0.25, 1, 2, 3, 4, 5, 6, 7, 8, 9];

const assertK9Limit = (k9Limit: number): void => {
  if (!Number.isFinite(k9Limit) || k9Limit <= 0) {
    throw new CalibrationError(k9Limit);
  }
};

export const scaleThresholds = (k9Limit: number): number[] => {
  assertK9Limit(k9Limit);
  return BASE_THRESHOLDS.map((threshold) => (threshold * k9Limit) / REFERENCE_K9_LIMIT);
};

/**
 * Maps a window's disturbance onto the station's K scale. Level 0 is reported as 0.25 so a
 * quiet window stays distinguishable from a window without data.
 */
export const quantizeKIndex = (disturbance: number, k9Limit: number): KIndexValue => {
  const thresholds = scaleThresholds(k9Limit);
  const statistic = Number.isFinite(disturbance) ? disturbance : 0;
  const reached = thresholds.filter((threshold) => threshold <= statistic).length;
  const index = Math.min(Math.max(reached - 1, 0), K_LEVELS.length - 1);
  return K_LEVELS[index];
};
