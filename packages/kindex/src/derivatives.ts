import type { ComponentTriplet, Sample } from './types';

export const MEDIAN_KERNEL_SIZE = 5;

export interface DerivativeRow {
  timestamp: Date;
  x: number | null;
  h: number | null;
  dxdt: number;
  dxdtSmooth: number;
  dhdt: number;
  dhdtSmooth: number;
}

const finite = (value: number | null | undefined): number | null =>
  value === undefined || value === null || !Number.isFinite(value) ? null : value;

/** Median filter with zero padding beyond both ends of the series. */
export const medianFilter = (values: readonly number[], kernelSize = MEDIAN_KERNEL_SIZE): number[] => {
  if (kernelSize < 1 || kernelSize % 2 === 0) {
    throw new RangeError(`Median kernel size must be a positive odd number, received ${kernelSize}`);
  }
  const half = (kernelSize - 1) / 2;
  return values.map((_, index) => {
    const window: number[] = [];
    for (let offset = -half; offset <= half; offset += 1) {
      window.push(values[index + offset] ?? 0);
    }
    window.sort((a, b) => a - b);
    return window[half];
  });
};

const absoluteSteps = (series: readonly (number | null)[]): number[] =>
  series.map((value, index) => {
    if (index === 0) {
      return 0;
    }
    const previous = series[index - 1];
    return value === null || previous === null ? 0 : Math.abs(value - previous);
  });

const horizontalIntensity = (sample: Sample, triplet: ComponentTriplet): number | null => {
  if (triplet === 'HDZ') {
    return finite(sample.values.H);
  }
  const x = finite(sample.values.X);
  const y = finite(sample.values.Y);
  return x === null || y === null ? null : Math.sqrt(x ** 2 + y ** 2);
};

const northComponent = (sample: Sample, triplet: ComponentTriplet, h: number | null): number | null => {
  if (triplet === 'XYZ') {
    return finite(sample.values.X);
  }
  // Declination is reported in arc minutes.
  const declination = finite(sample.values.D);
  return h === null || declination === null ? null : h * Math.cos(((declination / 60) * Math.PI) / 180);
};

/**
 * Rate of change of the north (X) and horizontal (H) field over a filtered series, for
 * read-only consumers such as dashboards. Does not alter the samples.
 */
export const computeDerivatives = (samples: readonly Sample[], triplet: ComponentTriplet): DerivativeRow[] => {
  const ordered = [...samples].sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
  const h = ordered.map((sample) => horizontalIntensity(sample, triplet));
  const x = ordered.map((sample, index) => northComponent(sample, triplet, h[index]));

  const dxdt = absoluteSteps(x);
  const dhdt = absoluteSteps(h);
  const dxdtSmooth = medianFilter(dxdt);
  const dhdtSmooth = medianFilter(dhdt);

  return ordered.map((sample, index) => ({
    timestamp: sample.timestamp,
    x: x[index],
    h: h[index],
    dxdt: dxdt[index],
    dxdtSmooth: dxdtSmooth[index],
    dhdt: dhdt[index],
    dhdtSmooth: dhdtSmooth[index]
  }));
};
