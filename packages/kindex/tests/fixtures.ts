import type { Sample } from '../src';

export interface FixtureRow {
  at: Date;
  values: Array<number | string>;
}

export interface FixtureFileOptions {
  columns: string[];
  rows: FixtureRow[];
  stationName?: string;
  iagaCode?: string;
  reported?: string;
}

const MINUTE_MS = 60_000;

const pad = (value: number, width: number): string => value.toString().padStart(width, '0');

const dayOfYear = (at: Date): number =>
  Math.floor(
    (Date.UTC(at.getUTCFullYear(), at.getUTCMonth(), at.getUTCDate()) - Date.UTC(at.getUTCFullYear(), 0, 1)) /
      86_400_000
  ) + 1;

const metadataLine = (label: string, value: string): string => ` ${label.padEnd(23)}${value.padEnd(44)}|`;

export const formatRow = (row: FixtureRow): string => {
  const iso = row.at.toISOString();
  const date = iso.slice(0, 10);
  const time = iso.slice(11, 23);
  const values = row.values.map((value) => (typeof value === 'number' ? value.toFixed(2) : value).padStart(10));
  return `${date} ${time} ${pad(dayOfYear(row.at), 3)}   ${values.join('')}`;
};

export const buildIagaFile = (options: FixtureFileOptions): string => {
  const lines = [metadataLine('Format', 'IAGA-2002'), metadataLine('Source of Data', 'Test Network')];
  if (options.stationName) {
    lines.push(metadataLine('Station Name', options.stationName));
  }
  if (options.iagaCode) {
    lines.push(metadataLine('IAGA Code', options.iagaCode));
  }
  if (options.reported) {
    lines.push(metadataLine('Reported', options.reported));
  }
  lines.push(metadataLine('Data Type', 'Provisional'));
  lines.push(' # Fixture generated for tests'.padEnd(69) + '|');
  lines.push(
    `DATE       TIME         DOY     ${options.columns.map((column) => column.padEnd(10)).join('')}|`
  );
  for (const row of options.rows) {
    lines.push(formatRow(row));
  }
  return `${lines.join('\n')}\n`;
};

export const minuteRows = (
  start: Date,
  count: number,
  valuesAt: (index: number) => Array<number | string>
): FixtureRow[] =>
  Array.from({ length: count }, (_, index) => ({
    at: new Date(start.getTime() + index * MINUTE_MS),
    values: valuesAt(index)
  }));

export const sampleAt = (iso: string, values: Sample['values']): Sample => ({
  timestamp: new Date(iso),
  values
});
