import assert from 'node:assert/strict';
import { test } from 'node:test';

import {
  FormatError,
  MISSING_VALUE_SENTINELS,
  parseObservatoryFile,
  parseReading,
  parseUtcTimestamp
} from '../src';
import { buildIagaFile, minuteRows } from './fixtures';

const START = new Date('2024-09-05T00:00:00.000Z');

test('parses generic XYZ columns', () => {
  const content = buildIagaFile({
    columns: ['X', 'Y', 'Z', 'F'],
    rows: minuteRows(START, 3, (index) => [100 + index, 200 + index, 30000, 40000])
  });

  const parsed = parseObservatoryFile(content, { stationCode: 'ent' });

  assert.equal(parsed.triplet, 'XYZ');
  assert.deepEqual(parsed.components, ['X', 'Y']);
  assert.equal(parsed.stationCode, 'ENT');
  assert.equal(parsed.stationName, 'ENT');
  assert.equal(parsed.samples.length, 3);
  assert.equal(parsed.samples[0].timestamp.toISOString(), '2024-09-05T00:00:00.000Z');
  assert.equal(parsed.samples[2].timestamp.toISOString(), '2024-09-05T00:02:00.000Z');
  assert.deepEqual(parsed.samples[1].values, { X: 101, Y: 201, Z: 30000 });
});

test('renames station-prefixed columns to generic labels', () => {
  const content = buildIagaFile({
    columns: ['ENTX', 'ENTY', 'ENTZ', 'ENTF'],
    stationName: 'Entoto',
    rows: minuteRows(START, 2, () => [12.5, -3.25, 30000, 40000])
  });

  const parsed = parseObservatoryFile(content, { stationCode: 'ENT' });

  assert.equal(parsed.triplet, 'XYZ');
  assert.equal(parsed.stationName, 'Entoto');
  assert.deepEqual(parsed.samples[0].values, { X: 12.5, Y: -3.25, Z: 30000 });
});

test('falls back to the IAGA code for prefixed columns', () => {
  const content = buildIagaFile({
    columns: ['ABGH', 'ABGD', 'ABGZ', 'ABGF'],
    iagaCode: 'ABG',
    rows: minuteRows(START, 1, () => [38000, 45.5, 20000, 43000])
  });

  const parsed = parseObservatoryFile(content);

  assert.equal(parsed.triplet, 'HDZ');
  assert.deepEqual(parsed.components, ['H', 'D']);
  assert.equal(parsed.stationCode, 'ABG');
  assert.deepEqual(parsed.samples[0].values, { H: 38000, D: 45.5, Z: 20000 });
});

test('resolves components from the reported metadata line', () => {
  const content = buildIagaFile({
    columns: ['QQQH', 'QQQD', 'QQQZ', 'QQQF'],
    reported: 'HDZF',
    rows: minuteRows(START, 1, () => [38000, 12, 20000, 43000])
  });

  const parsed = parseObservatoryFile(content, { stationCode: 'ENT' });

  assert.equal(parsed.triplet, 'HDZ');
  assert.deepEqual(parsed.samples[0].values, { H: 38000, D: 12, Z: 20000 });
});

test('rejects files without a header line', () => {
  assert.throws(
    () => parseObservatoryFile(' Format  IAGA-2002 |\n2024-09-05 00:00:00.000 249 1 2 3\n'),
    (error: unknown) => error instanceof FormatError && error.message === 'header not found'
  );
});

test('rejects files without resolvable components', () => {
  const content = buildIagaFile({
    columns: ['A', 'B', 'C'],
    rows: minuteRows(START, 1, () => [1, 2, 3])
  });

  assert.throws(
    () => parseObservatoryFile(content, { stationCode: 'ENT' }),
    (error: unknown) => error instanceof FormatError && error.message === 'no valid components'
  );
});

test('rejects reported components whose columns are absent', () => {
  const content = buildIagaFile({
    columns: ['QQQX', 'QQQY', 'QQQF'],
    reported: 'XYZF',
    rows: minuteRows(START, 1, () => [1, 2, 3])
  });

  assert.throws(
    () => parseObservatoryFile(content, { stationCode: 'ENT' }),
    (error: unknown) => error instanceof FormatError && error.message === 'missing column Z'
  );
});

test('decodes fill values and non-numeric cells as missing', () => {
  const content = buildIagaFile({
    columns: ['X', 'Y', 'Z', 'F'],
    rows: minuteRows(START, 3, (index) => {
      if (index === 0) {
        return [99999.0, 99999.9, 'n/a', 40000];
      }
      return ['99999.00', '99999.9', 30000, 40000];
    })
  });

  const parsed = parseObservatoryFile(content);

  for (const sample of parsed.samples) {
    assert.equal(sample.values.X, null);
    assert.equal(sample.values.Y, null);
    for (const value of Object.values(sample.values)) {
      assert.ok(value === null || value === undefined || !MISSING_VALUE_SENTINELS.includes(value));
    }
  }
  assert.equal(parsed.samples[0].values.Z, null);
  assert.equal(parsed.samples[1].values.Z, 30000);
});

test('drops rows whose timestamp does not parse', () => {
  const content = [
    'DATE       TIME         DOY     X         Y         Z         F         |',
    '2024-09-05 00:00:00.000 249     1.00      2.00      3.00      4.00',
    '2024-02-30 00:01:00.000 061     1.00      2.00      3.00      4.00',
    'corrupted  line',
    '2024-09-05 25:00:00.000 249     1.00      2.00      3.00      4.00',
    '2024-09-05 00:03:00.000 249     5.00      6.00      7.00      8.00',
    '2024-09-05'
  ].join('\n');

  const parsed = parseObservatoryFile(content);

  assert.deepEqual(
    parsed.samples.map((sample) => sample.timestamp.toISOString()),
    ['2024-09-05T00:00:00.000Z', '2024-09-05T00:03:00.000Z']
  );
  assert.deepEqual(parsed.samples[1].values, { X: 5, Y: 6, Z: 7 });
});

test('keeps file order of data rows', () => {
  const content = buildIagaFile({
    columns: ['X', 'Y', 'Z', 'F'],
    rows: [
      { at: new Date('2024-09-05T02:00:00.000Z'), values: [1, 1, 1, 1] },
      { at: new Date('2024-09-05T01:00:00.000Z'), values: [2, 2, 2, 2] }
    ]
  });

  const parsed = parseObservatoryFile(content);

  assert.deepEqual(
    parsed.samples.map((sample) => sample.values.X),
    [1, 2]
  );
});

test('reads a colon-delimited station name', () => {
  const content = [
    'Station Name: Entoto Observatory | extra',
    'DATE       TIME         DOY     X         Y         Z         |',
    '2024-09-05 00:00:00.000 249     1.00      2.00      3.00'
  ].join('\n');

  const parsed = parseObservatoryFile(content, { stationCode: 'ENT' });

  assert.equal(parsed.stationName, 'Entoto Observatory');
});

test('parseUtcTimestamp validates calendar dates and clock times', () => {
  assert.equal(parseUtcTimestamp('2024-09-05', '13:45:30.250')?.toISOString(), '2024-09-05T13:45:30.250Z');
  assert.equal(parseUtcTimestamp('2024-09-05', '13:45')?.toISOString(), '2024-09-05T13:45:00.000Z');
  assert.equal(parseUtcTimestamp('2024-02-29', '00:00:00')?.toISOString(), '2024-02-29T00:00:00.000Z');
  assert.equal(parseUtcTimestamp('2023-02-29', '00:00:00'), null);
  assert.equal(parseUtcTimestamp('2024-13-01', '00:00:00'), null);
  assert.equal(parseUtcTimestamp('05/09/2024', '00:00:00'), null);
  assert.equal(parseUtcTimestamp('2024-09-05', '12:60:00'), null);
});

test('parseReading accepts plain decimals only', () => {
  assert.equal(parseReading('-12.50'), -12.5);
  assert.equal(parseReading('1e3'), 1000);
  assert.equal(parseReading('99999.90'), null);
  assert.equal(parseReading('88888.00'), 88888);
  assert.equal(parseReading('0x10'), null);
  assert.equal(parseReading(''), null);
  assert.equal(parseReading(undefined), null);
});
