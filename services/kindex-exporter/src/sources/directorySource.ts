import { readdir, readFile } from 'node:fs/promises';
import path from 'node:path';

import { selectRecentFiles, type RawObservatoryFile, type StationConfig } from '@geomag/kindex';

import type { ExporterLogger, ObservatoryFileSource } from '../types';

export interface DirectoryFileSourceOptions {
  dataDir: string;
  logger: ExporterLogger;
}

const isMissingDirectory = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');

/**
 * Reads minute files from a local mirror of the observatory archive, one directory per station
 * (`<dataDir>/<code>` unless the station names its own `sourceDir`).
 */
export class DirectoryFileSource implements ObservatoryFileSource {
  private readonly dataDir: string;
  private readonly logger: ExporterLogger;

  constructor(options: DirectoryFileSourceOptions) {
    this.dataDir = options.dataDir;
    this.logger = options.logger;
  }

  resolveDirectory(station: StationConfig): string {
    return path.resolve(this.dataDir, station.sourceDir ?? station.code.toLowerCase());
  }

  async fetchRecent(station: StationConfig): Promise<RawObservatoryFile[]> {
    const directory = this.resolveDirectory(station);

    let names: string[];
    try {
      names = await readdir(directory);
    } catch (error) {
      if (isMissingDirectory(error)) {
        this.logger.warn({ station: station.code, directory }, 'Observatory directory not found');
        return [];
      }
      throw error;
    }

    const selected = selectRecentFiles(names, station.code, station.lenDays);
    if (selected.length === 0) {
      this.logger.warn({ station: station.code, directory }, 'No matching observatory files found');
      return [];
    }

    const files: RawObservatoryFile[] = [];
    for (const entry of selected) {
      const filePath = path.join(directory, entry.name);
      try {
        const content = await readFile(filePath, 'utf8');
        files.push({ name: entry.name, content });
        this.logger.debug({ station: station.code, filePath }, 'Loaded observatory file');
      } catch (error) {
        this.logger.warn({ err: error, station: station.code, filePath }, 'Failed to read observatory file');
      }
    }
    return files;
  }
}
