import assert from 'node:assert/strict';
import { test } from 'node:test';

import pino from 'pino';

import type { RawObservatoryFile } from '@geomag/kindex';

import { StationNotFoundError } from '../src/errors';
import { createMetrics } from '../src/metrics';
import { createKIndexPoller } from '../src/poller';
import { StationReportStore } from '../src/store';
import type { ObservatoryFileSource } from '../src/types';
import { StaticFileSource, TEST_STATION, buildRampFile } from './fixtures';

const logger = pino({ level: 'silent' });
const FIXED_NOW = new Date('2024-09-05T12:00:00.000Z');

const setup = (source: ObservatoryFileSource) => {
  const store = new StationReportStore();
  const metrics = createMetrics();
  const poller = createKIndexPoller({
    stations: [TEST_STATION],
    source,
    store,
    metrics,
    logger,
    now: () => FIXED_NOW
  });
  return { store, metrics, poller };
};

const counterValue = async (
  metrics: ReturnType<typeof createMetrics>,
  result: 'success' | 'empty' | 'failed'
): Promise<number | undefined> => {
  const snapshot = await metrics.cycles.get();
  return snapshot.values.find((entry) => entry.labels.result === result)?.value;
};

test('a cycle stores the report and publishes the latest K-index', async () => {
  const source = new StaticFileSource([
    { name: 'ent20240905pmin.min', content: buildRampFile(new Date('2024-09-05T00:00:00.000Z')) }
  ]);
  const { store, metrics, poller } = setup(source);

  const report = await poller.runCycle('ent');

  assert.equal(report.latest?.value, 4);
  assert.equal(store.get('ENT'), report);
  assert.equal(store.isReady('ENT'), true);

  const gauge = await metrics.kIndex.get();
  assert.deepEqual(
    gauge.values.map((entry) => [entry.labels.station, entry.value]),
    [['ENT', 4]]
  );
  const lastSuccess = await metrics.lastSuccess.get();
  assert.equal(lastSuccess.values[0]?.value, FIXED_NOW.getTime() / 1000);
  assert.equal(await counterValue(metrics, 'success'), 1);
});

test('an empty supply is recorded without touching the gauge', async () => {
  const { store, metrics, poller } = setup(new StaticFileSource([]));

  const report = await poller.runCycle('ENT');

  assert.equal(report.latest, null);
  assert.equal(store.isReady('ENT'), true);
  assert.equal(await counterValue(metrics, 'empty'), 1);
  assert.deepEqual((await metrics.kIndex.get()).values, []);
});

test('rejected files are counted', async () => {
  const { metrics, poller } = setup(
    new StaticFileSource([{ name: 'broken.min', content: 'garbage' }])
  );

  const report = await poller.runCycle('ENT');

  assert.deepEqual(report.files.rejected, [{ name: 'broken.min', reason: 'header not found' }]);
  const rejected = await metrics.filesRejected.get();
  assert.equal(rejected.values[0]?.value, 1);
});

test('a failing source fails the cycle and is counted', async () => {
  const source: ObservatoryFileSource = {
    async fetchRecent() {
      throw new Error('mirror unavailable');
    }
  };
  const { store, metrics, poller } = setup(source);

  await assert.rejects(poller.runCycle('ENT'), /mirror unavailable/);
  assert.equal(store.isReady('ENT'), false);
  assert.equal(await counterValue(metrics, 'failed'), 1);
  assert.equal(poller.isRunning('ENT'), false);
});

test('concurrent requests share one cycle per station', async () => {
  let release: (files: RawObservatoryFile[]) => void = () => undefined;
  let calls = 0;
  const source: ObservatoryFileSource = {
    fetchRecent() {
      calls += 1;
      return new Promise((resolve) => {
        release = resolve;
      });
    }
  };
  const { poller } = setup(source);

  const first = poller.runCycle('ENT');
  const second = poller.runCycle('ENT');

  assert.equal(first, second);
  assert.equal(poller.isRunning('ENT'), true);
  release([]);
  await first;
  assert.equal(calls, 1);
  assert.equal(poller.isRunning('ENT'), false);
});

test('unknown stations are rejected', () => {
  const { poller } = setup(new StaticFileSource([]));

  assert.throws(() => poller.runCycle('XYZ'), StationNotFoundError);
});

test('start runs a first cycle immediately and stop waits for it', async () => {
  const source = new StaticFileSource([
    { name: 'ent20240905pmin.min', content: buildRampFile(new Date('2024-09-05T00:00:00.000Z')) }
  ]);
  const { store, poller } = setup(source);

  poller.start();
  await poller.stop();

  assert.equal(source.calls, 1);
  assert.equal(store.get('ENT')?.latest?.value, 4);
});
