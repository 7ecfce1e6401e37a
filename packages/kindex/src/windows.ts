import type { ComponentLabel, HorizontalComponents, Sample, Window } from './types';

export const WINDOW_SECONDS = 10_800;
export const WINDOW_MS = WINDOW_SECONDS * 1000;
const HALF_WINDOW_MS = WINDOW_MS / 2;

/** UTC midnight of the calendar day containing `timestamp`. */
export const utcDayStart = (timestamp: Date): Date =>
  new Date(Date.UTC(timestamp.getUTCFullYear(), timestamp.getUTCMonth(), timestamp.getUTCDate()));

export const assignBlock = (timestamp: Date, dayStart: Date): number =>
  Math.floor((timestamp.getTime() - dayStart.getTime()) / WINDOW_MS);

const earliest = (samples: readonly Sample[]): Date => {
  let first = samples[0].timestamp;
  for (const sample of samples) {
    if (sample.timestamp.getTime() < first.getTime()) {
      first = sample.timestamp;
    }
  }
  return first;
};

const range = (samples: readonly Sample[], label: ComponentLabel): number => {
  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;
  for (const sample of samples) {
    const value = sample.values[label];
    if (value === undefined || value === null || Number.isNaN(value)) {
      continue;
    }
    min = Math.min(min, value);
    max = Math.max(max, value);
  }
  return max >= min ? max - min : 0;
};

/**
 * Buckets samples into 3-hour UTC blocks anchored at midnight of the earliest sample's day and
 * measures the larger peak-to-peak range of the two horizontal components in each block.
 * A block holding a single sample has disturbance 0.
 */
export const aggregateWindows = (
  samples: readonly Sample[],
  components: HorizontalComponents
): Window[] => {
  if (samples.length === 0) {
    return [];
  }

  const dayStart = utcDayStart(earliest(samples));
  const blocks = new Map<number, Sample[]>();
  for (const sample of samples) {
    const blockIndex = assignBlock(sample.timestamp, dayStart);
    const members = blocks.get(blockIndex);
    if (members) {
      members.push(sample);
    } else {
      blocks.set(blockIndex, [sample]);
    }
  }

  const [first, second] = components;
  return Array.from(blocks.keys())
    .sort((a, b) => a - b)
    .map((blockIndex) => {
      const members = blocks.get(blockIndex) ?? [];
      const start = new Date(dayStart.getTime() + blockIndex * WINDOW_MS);
      return {
        blockIndex,
        start,
        center: new Date(start.getTime() + HALF_WINDOW_MS),
        sampleCount: members.length,
        disturbance: members.length > 1 ? Math.max(range(members, first), range(members, second)) : 0
      };
    });
};
