import { FormatError } from './errors';
import {
  TRIPLET_LABELS,
  horizontalComponents,
  type ComponentLabel,
  type ComponentTriplet,
  type ComponentValues,
  type ParsedFile,
  type Sample
} from './types';

/** Fill values IAGA-2002 files use for missing readings. */
export const MISSING_VALUE_SENTINELS: readonly number[] = [99999.0, 99999.9];

const TRIPLETS: readonly ComponentTriplet[] = ['XYZ', 'HDZ'];
const RESERVED_FIELDS = new Set(['DATE', 'TIME', 'DOY']);
const NUMERIC_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const TIME_PATTERN = /^(\d{2}):(\d{2})(?::(\d{2})(?:\.(\d+))?)?$/;
const DEFAULT_STATION_CODE = 'UNKNOWN';

export interface ParseObservatoryFileOptions {
  /** Station code used to recognise prefixed column labels such as `ENTX`. */
  stationCode?: string;
}

interface ComponentColumns {
  triplet: ComponentTriplet;
  columns: Record<ComponentLabel, number | undefined>;
}

interface FileMetadata {
  iagaCode: string | null;
  stationName: string | null;
  reported: string | null;
}

const splitFields = (line: string): string[] =>
  line
    .split(/\s+/)
    .map((field) => field.replace(/\|/g, '').trim().toUpperCase())
    .filter((field) => field.length > 0);

const isHeaderLine = (line: string): boolean =>
  line.startsWith('DATE') && line.includes('TIME') && line.includes('DOY');

const readMetadataValue = (line: string, label: string): string | null => {
  if (!line.toLowerCase().startsWith(label.toLowerCase())) {
    return null;
  }
  let rest = line.slice(label.length);
  const pipe = rest.indexOf('|');
  if (pipe >= 0) {
    rest = rest.slice(0, pipe);
  }
  rest = rest.trim();
  if (rest.startsWith(':')) {
    rest = rest.slice(1).trim();
  }
  return rest.length > 0 ? rest : null;
};

const readMetadata = (lines: readonly string[]): FileMetadata => {
  const metadata: FileMetadata = { iagaCode: null, stationName: null, reported: null };
  for (const line of lines) {
    const iagaCode = readMetadataValue(line, 'IAGA Code');
    if (iagaCode) {
      metadata.iagaCode = iagaCode.split(/\s+/)[0].toUpperCase();
      continue;
    }
    const stationName = readMetadataValue(line, 'Station Name');
    if (stationName) {
      metadata.stationName = stationName;
      continue;
    }
    const reported = readMetadataValue(line, 'Reported');
    if (reported) {
      metadata.reported = reported.replace(/[^A-Za-z]/g, '').toUpperCase();
    }
  }
  return metadata;
};

const locate = (fields: readonly string[], names: readonly string[]): number[] | null => {
  const indices = names.map((name) => fields.indexOf(name));
  return indices.every((index) => index >= 0) ? indices : null;
};

const toColumns = (triplet: ComponentTriplet, indices: readonly number[]): ComponentColumns => {
  const columns: Record<ComponentLabel, number | undefined> = {
    X: undefined,
    Y: undefined,
    Z: undefined,
    H: undefined,
    D: undefined
  };
  TRIPLET_LABELS[triplet].forEach((label, position) => {
    columns[label] = indices[position];
  });
  return { triplet, columns };
};

const decodeReportedTriplet = (reported: string | null): ComponentTriplet | null => {
  switch (reported) {
    case 'XYZF':
    case 'XYZ':
      return 'XYZ';
    case 'HDZF':
    case 'HDZ':
      return 'HDZ';
    default:
      return null;
  }
};

const resolveComponents = (
  fields: readonly string[],
  prefixes: readonly string[],
  metadata: FileMetadata
): ComponentColumns => {
  for (const triplet of TRIPLETS) {
    const indices = locate(fields, TRIPLET_LABELS[triplet]);
    if (indices) {
      return toColumns(triplet, indices);
    }
  }

  for (const prefix of prefixes) {
    for (const triplet of TRIPLETS) {
      const indices = locate(
        fields,
        TRIPLET_LABELS[triplet].map((label) => `${prefix}${label}`)
      );
      if (indices) {
        return toColumns(triplet, indices);
      }
    }
  }

  const reported = decodeReportedTriplet(metadata.reported);
  if (!reported) {
    throw new FormatError('no valid components');
  }

  const indices = TRIPLET_LABELS[reported].map((label) => {
    const index = fields.findIndex(
      (field) => !RESERVED_FIELDS.has(field) && field.length > label.length && field.endsWith(label)
    );
    if (index < 0) {
      throw new FormatError(`missing column ${label}`);
    }
    return index;
  });
  return toColumns(reported, indices);
};

/** Combines IAGA-2002 `DATE` and `TIME` columns into a UTC instant, or `null` when invalid. */
export const parseUtcTimestamp = (date: string, time: string): Date | null => {
  const dateMatch = DATE_PATTERN.exec(date);
  const timeMatch = TIME_PATTERN.exec(time);
  if (!dateMatch || !timeMatch) {
    return null;
  }

  const year = Number(dateMatch[1]);
  const month = Number(dateMatch[2]);
  const day = Number(dateMatch[3]);
  const hours = Number(timeMatch[1]);
  const minutes = Number(timeMatch[2]);
  const seconds = timeMatch[3] ? Number(timeMatch[3]) : 0;
  const millis = timeMatch[4] ? Number(timeMatch[4].slice(0, 3).padEnd(3, '0')) : 0;
  if (hours > 23 || minutes > 59 || seconds > 59) {
    return null;
  }

  const timestamp = new Date(Date.UTC(year, month - 1, day, hours, minutes, seconds, millis));
  if (
    timestamp.getUTCFullYear() !== year ||
    timestamp.getUTCMonth() !== month - 1 ||
    timestamp.getUTCDate() !== day
  ) {
    return null;
  }
  return timestamp;
};

/** Numeric reading of a data cell; non-numeric cells and fill values decode to `null`. */
export const parseReading = (token: string | undefined): number | null => {
  if (token === undefined || !NUMERIC_PATTERN.test(token)) {
    return null;
  }
  const value = Number(token);
  if (!Number.isFinite(value) || MISSING_VALUE_SENTINELS.includes(value)) {
    return null;
  }
  return value;
};

/**
 * Parses one IAGA-2002 minute file into samples of its resolved component triplet.
 *
 * Rows whose timestamp cannot be parsed are dropped. Throws {@link FormatError} when the
 * header or the component columns cannot be found.
 */
export const parseObservatoryFile = (
  content: string,
  options: ParseObservatoryFileOptions = {}
): ParsedFile => {
  const lines = content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  const headerIndex = lines.findIndex(isHeaderLine);
  if (headerIndex < 0) {
    throw new FormatError('header not found');
  }

  const fields = splitFields(lines[headerIndex]);
  const metadata = readMetadata(lines.slice(0, headerIndex));
  const configuredCode = options.stationCode?.trim().toUpperCase() || null;
  const prefixes = Array.from(
    new Set([configuredCode, metadata.iagaCode].filter((code): code is string => Boolean(code)))
  );
  const { triplet, columns } = resolveComponents(fields, prefixes, metadata);
  const labels = TRIPLET_LABELS[triplet];

  const dateColumn = fields.indexOf('DATE');
  const timeColumn = fields.indexOf('TIME');

  const samples: Sample[] = [];
  for (const line of lines.slice(headerIndex + 1)) {
    const tokens = line.split(/\s+/);
    const date = tokens[dateColumn];
    const time = tokens[timeColumn];
    if (date === undefined || time === undefined) {
      continue;
    }
    const timestamp = parseUtcTimestamp(date, time);
    if (!timestamp) {
      continue;
    }

    const values: ComponentValues = {};
    for (const label of labels) {
      const column = columns[label];
      values[label] = column === undefined ? null : parseReading(tokens[column]);
    }
    samples.push({ timestamp, values });
  }

  const stationCode = configuredCode ?? metadata.iagaCode ?? DEFAULT_STATION_CODE;
  return {
    samples,
    triplet,
    components: horizontalComponents(triplet),
    stationCode,
    stationName: metadata.stationName ?? stationCode
  };
};
