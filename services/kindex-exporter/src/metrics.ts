import { Counter, Gauge, Histogram, Registry } from 'prom-client';

export type CycleResult = 'success' | 'empty' | 'failed';

export interface ExporterMetrics {
  register: Registry;
  kIndex: Gauge<'station'>;
  disturbance: Gauge<'station'>;
  cycles: Counter<'station' | 'result'>;
  filesRejected: Counter<'station'>;
  cycleDuration: Histogram<'station'>;
  lastSuccess: Gauge<'station'>;
}

export const createMetrics = (): ExporterMetrics => {
  const register = new Registry();

  const kIndex = new Gauge({
    name: 'geomagnetic_k_index',
    help: 'K-index of the most recent 3-hour window',
    registers: [register],
    labelNames: ['station'] as const
  });

  const disturbance = new Gauge({
    name: 'geomagnetic_disturbance_nt',
    help: 'Horizontal field range of the most recent 3-hour window in nT',
    registers: [register],
    labelNames: ['station'] as const
  });

  const cycles = new Counter({
    name: 'kindex_cycles_total',
    help: 'Processing cycles per station by outcome',
    registers: [register],
    labelNames: ['station', 'result'] as const
  });

  const filesRejected = new Counter({
    name: 'kindex_files_rejected_total',
    help: 'Observatory files skipped because they could not be parsed',
    registers: [register],
    labelNames: ['station'] as const
  });

  const cycleDuration = new Histogram({
    name: 'kindex_cycle_duration_seconds',
    help: 'Duration of a processing cycle including file retrieval',
    registers: [register],
    labelNames: ['station'] as const,
    buckets: [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30]
  });

  const lastSuccess = new Gauge({
    name: 'kindex_last_success_timestamp_seconds',
    help: 'Unix time of the last cycle that produced K-index values',
    registers: [register],
    labelNames: ['station'] as const
  });

  return {
    register,
    kIndex,
    disturbance,
    cycles,
    filesRejected,
    cycleDuration,
    lastSuccess
  };
};
