import { parseUtcTimestamp } from './parser';

const MINUTE_FILE_SUFFIX = 'pmin.min';

export interface DatedFileName {
  name: string;
  date: Date;
}

/** Date encoded as `YYYYMMDD` right after the station code, e.g. `ent20240905pmin.min`. */
export const readFileDate = (name: string, stationCode: string): Date | null => {
  const digits = name.slice(stationCode.length, stationCode.length + 8);
  if (!/^\d{8}$/.test(digits)) {
    return null;
  }
  return parseUtcTimestamp(`${digits.slice(0, 4)}-${digits.slice(4, 6)}-${digits.slice(6, 8)}`, '00:00');
};

/** Newest `lenDays` provisional minute files of a station, newest first. */
export const selectRecentFiles = (
  names: readonly string[],
  stationCode: string,
  lenDays: number
): DatedFileName[] => {
  const prefix = stationCode.toLowerCase();
  const dated: DatedFileName[] = [];
  for (const name of names) {
    const lower = name.toLowerCase();
    if (!lower.startsWith(prefix) || !lower.endsWith(MINUTE_FILE_SUFFIX)) {
      continue;
    }
    const date = readFileDate(name, stationCode);
    if (date) {
      dated.push({ name, date });
    }
  }

  return dated
    .sort((a, b) => b.date.getTime() - a.date.getTime())
    .slice(0, Math.max(0, lenDays));
};
