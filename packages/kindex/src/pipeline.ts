import { FormatError } from './errors';
import { parseObservatoryFile } from './parser';
import { quantizeKIndex } from './quantizer';
import { filterOutliers, type QualityFilterOptions } from './qualityFilter';
import type { StationConfig } from './schema';
import type {
  ComponentTriplet,
  HorizontalComponents,
  KIndexReport,
  KIndexResult,
  RawObservatoryFile,
  RejectedFile,
  Sample
} from './types';
import { aggregateWindows } from './windows';

export type PipelineStation = Pick<StationConfig, 'code' | 'k9Limit' | 'name'>;

export interface ComputeKIndexOptions extends QualityFilterOptions {
  now?: () => Date;
}

const byTimestamp = (a: Sample, b: Sample): number => a.timestamp.getTime() - b.timestamp.getTime();

/**
 * Runs one processing cycle for a station: parse every file, gate outliers on the horizontal
 * components, bucket into 3-hour windows and quantize each window.
 *
 * Files that fail with {@link FormatError} are reported in `files.rejected` and skipped. The first
 * file holding data fixes the component triplet. A cycle without usable data yields an empty
 * report rather than an error.
 */
export const computeKIndexReport = (
  files: readonly RawObservatoryFile[],
  station: PipelineStation,
  options: ComputeKIndexOptions = {}
): KIndexReport => {
  const now = options.now ?? (() => new Date());
  const accepted: string[] = [];
  const rejected: RejectedFile[] = [];
  const merged: Sample[] = [];
  let triplet: ComponentTriplet | null = null;
  let components: HorizontalComponents | null = null;
  let stationName = station.name ?? station.code;

  for (const file of files) {
    try {
      const parsed = parseObservatoryFile(file.content, { stationCode: station.code });
      // A header-only file (e.g. today's, before the first minute arrives) neither fixes nor
      // conflicts with the triplet.
      if (parsed.samples.length === 0) {
        accepted.push(file.name);
        continue;
      }
      if (triplet && parsed.triplet !== triplet) {
        throw new FormatError(`component triplet ${parsed.triplet} conflicts with ${triplet}`);
      }
      if (!triplet) {
        triplet = parsed.triplet;
        components = parsed.components;
        stationName = station.name ?? parsed.stationName;
      }
      merged.push(...parsed.samples);
      accepted.push(file.name);
    } catch (error) {
      if (!(error instanceof FormatError)) {
        throw error;
      }
      rejected.push({ name: file.name, reason: error.message });
    }
  }

  const samples = components
    ? filterOutliers(merged, components, { maxAbsScore: options.maxAbsScore }).sort(byTimestamp)
    : [];
  const windows = components ? aggregateWindows(samples, components) : [];
  const results: KIndexResult[] = windows.map((window) => ({
    value: quantizeKIndex(window.disturbance, station.k9Limit),
    windowCenter: window.center,
    disturbance: window.disturbance
  }));

  return {
    station: station.code,
    stationName,
    triplet,
    components,
    generatedAt: now(),
    samples,
    windows,
    results,
    latest: results.length > 0 ? results[results.length - 1] : null,
    files: { accepted, rejected }
  };
};
