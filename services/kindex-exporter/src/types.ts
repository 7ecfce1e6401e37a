import type { FastifyBaseLogger } from 'fastify';

import type { RawObservatoryFile, StationConfig } from '@geomag/kindex';

import type { ExporterConfig } from './config';
import type { ExporterMetrics } from './metrics';
import type { KIndexPoller } from './poller';
import type { StationReportStore } from './store';

export type ExporterLogger = FastifyBaseLogger;

export interface ObservatoryFileSource {
  /** Raw contents of the station's most recent `lenDays` minute files. */
  fetchRecent(station: StationConfig): Promise<RawObservatoryFile[]>;
}

export interface AppContext {
  config: ExporterConfig;
  store: StationReportStore;
  metrics: ExporterMetrics;
  poller: KIndexPoller;
}
