import type { KIndexReport } from '@geomag/kindex';

/** Last computed report per station; replaced wholesale on every cycle. */
export class StationReportStore {
  private readonly reports = new Map<string, KIndexReport>();

  set(report: KIndexReport): void {
    this.reports.set(report.station, report);
  }

  get(station: string): KIndexReport | null {
    return this.reports.get(station) ?? null;
  }

  isReady(station: string): boolean {
    return this.reports.has(station);
  }
}
