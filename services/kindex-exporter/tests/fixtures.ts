import type { RawObservatoryFile, StationConfig } from '@geomag/kindex';

import type { ExporterConfig } from '../src/config';
import type { ObservatoryFileSource } from '../src/types';

const MINUTE_MS = 60_000;

export const TEST_STATION: StationConfig = {
  code: 'ENT',
  name: 'Entoto',
  k9Limit: 500,
  lenDays: 3,
  pollIntervalMinutes: 10
};

export const makeConfig = (overrides: Partial<ExporterConfig> = {}): ExporterConfig => ({
  host: '127.0.0.1',
  port: 0,
  logLevel: 'silent',
  dataDir: '/nonexistent',
  ftp: null,
  pollerEnabled: false,
  stations: [TEST_STATION],
  ...overrides
});

/**
 * Three hours of minute data from `start` with X ramping 100 to 140 nT and Y ramping 100 to
 * 110 nT, which quantizes to K=4 on a 500 nT scale.
 */
export const buildRampFile = (start: Date, prefix = 'ENT'): string => {
  const lines = [
    ' Format                 IAGA-2002                                    |',
    ' Station Name           Entoto                                       |',
    ` IAGA Code              ${prefix.padEnd(45)}|`,
    ' Reported               XYZF                                         |',
    `DATE       TIME         DOY     ${prefix}X      ${prefix}Y      ${prefix}Z      ${prefix}F   |`
  ];
  for (let index = 0; index < 180; index += 1) {
    const at = new Date(start.getTime() + index * MINUTE_MS).toISOString();
    const x = (100 + (40 * index) / 179).toFixed(2);
    const y = (100 + (10 * index) / 179).toFixed(2);
    lines.push(`${at.slice(0, 10)} ${at.slice(11, 23)} 249 ${x} ${y} 30000.00 40000.00`);
  }
  return `${lines.join('\n')}\n`;
};

export class StaticFileSource implements ObservatoryFileSource {
  calls = 0;

  constructor(private readonly files: RawObservatoryFile[]) {}

  async fetchRecent(): Promise<RawObservatoryFile[]> {
    this.calls += 1;
    return this.files;
  }
}
