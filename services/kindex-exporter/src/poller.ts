import { computeKIndexReport, type KIndexReport, type StationConfig } from '@geomag/kindex';

import { StationNotFoundError } from './errors';
import type { ExporterMetrics } from './metrics';
import type { StationReportStore } from './store';
import type { ExporterLogger, ObservatoryFileSource } from './types';

const MINUTE_MS = 60_000;
const MIN_INTERVAL_MS = 1_000;

export interface KIndexPollerOptions {
  stations: readonly StationConfig[];
  source: ObservatoryFileSource;
  store: StationReportStore;
  metrics: ExporterMetrics;
  logger: ExporterLogger;
  now?: () => Date;
}

export interface KIndexPoller {
  start(): void;
  stop(): Promise<void>;
  /** Runs one cycle now, or joins the cycle already running for the station. */
  runCycle(station: string): Promise<KIndexReport>;
  isRunning(station: string): boolean;
}

export const createKIndexPoller = ({
  stations,
  source,
  store,
  metrics,
  logger,
  now = () => new Date()
}: KIndexPollerOptions): KIndexPoller => {
  const inFlight = new Map<string, Promise<KIndexReport>>();
  const timers = new Map<string, NodeJS.Timeout>();
  let stopped = false;

  const findStation = (code: string): StationConfig => {
    const station = stations.find((entry) => entry.code === code.toUpperCase());
    if (!station) {
      throw new StationNotFoundError(code);
    }
    return station;
  };

  const executeCycle = async (station: StationConfig): Promise<KIndexReport> => {
    const log = logger.child({ station: station.code });
    const endTimer = metrics.cycleDuration.startTimer({ station: station.code });
    try {
      log.info('Fetching observatory files');
      const files = await source.fetchRecent(station);
      const report = computeKIndexReport(files, station, { now });

      for (const rejected of report.files.rejected) {
        metrics.filesRejected.inc({ station: station.code });
        log.warn({ file: rejected.name, reason: rejected.reason }, 'Skipped observatory file');
      }
      store.set(report);

      if (!report.latest) {
        metrics.cycles.inc({ station: station.code, result: 'empty' });
        log.warn({ files: files.length }, 'No K-index values computed this cycle');
        return report;
      }

      metrics.cycles.inc({ station: station.code, result: 'success' });
      metrics.kIndex.set({ station: station.code }, report.latest.value);
      metrics.disturbance.set({ station: station.code }, report.latest.disturbance);
      metrics.lastSuccess.set({ station: station.code }, report.generatedAt.getTime() / 1000);
      log.info(
        {
          kIndex: report.latest.value,
          windowCenter: report.latest.windowCenter.toISOString(),
          windows: report.windows.length,
          samples: report.samples.length
        },
        'K-index updated'
      );
      return report;
    } catch (error) {
      metrics.cycles.inc({ station: station.code, result: 'failed' });
      throw error;
    } finally {
      endTimer();
    }
  };

  const runCycle = (code: string): Promise<KIndexReport> => {
    const station = findStation(code);
    const running = inFlight.get(station.code);
    if (running) {
      return running;
    }

    const cycle = executeCycle(station).finally(() => {
      inFlight.delete(station.code);
    });
    inFlight.set(station.code, cycle);
    return cycle;
  };

  const tick = (station: StationConfig) => {
    if (stopped) {
      return;
    }
    if (inFlight.has(station.code)) {
      logger.debug({ station: station.code }, 'Skipping cycle: previous cycle still running');
      return;
    }
    runCycle(station.code).catch((error) => {
      logger.error({ err: error, station: station.code }, 'K-index cycle failed');
    });
  };

  return {
    start() {
      if (timers.size > 0) {
        return;
      }
      stopped = false;
      for (const station of stations) {
        const intervalMs = Math.max(station.pollIntervalMinutes * MINUTE_MS, MIN_INTERVAL_MS);
        timers.set(
          station.code,
          setInterval(() => tick(station), intervalMs)
        );
        tick(station);
        logger.info({ station: station.code, intervalMs }, 'K-index poller started');
      }
    },

    async stop() {
      stopped = true;
      for (const timer of timers.values()) {
        clearInterval(timer);
      }
      timers.clear();
      await Promise.allSettled(Array.from(inFlight.values()));
    },

    runCycle,

    isRunning(station: string) {
      return inFlight.has(station.toUpperCase());
    }
  };
};
