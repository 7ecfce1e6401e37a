import path from 'node:path';
import { Writable } from 'node:stream';

import { Client } from 'basic-ftp';

import { selectRecentFiles, type RawObservatoryFile, type StationConfig } from '@geomag/kindex';

import type { FtpConfig } from '../config';
import type { ExporterLogger, ObservatoryFileSource } from '../types';

export interface FtpListingEntry {
  name: string;
  isFile: boolean;
}

export interface FtpAccessOptions {
  host: string;
  port: number;
  user: string;
  password: string;
  secure: boolean;
}

/** The subset of the `basic-ftp` client the source drives. */
export interface FtpClient {
  access(options: FtpAccessOptions): Promise<unknown>;
  list(remotePath?: string): Promise<FtpListingEntry[]>;
  downloadTo(destination: Writable, fromRemotePath: string): Promise<unknown>;
  close(): void;
}

export interface FtpFileSourceOptions extends FtpConfig {
  logger: ExporterLogger;
  createClient?: (timeoutMs: number) => FtpClient;
}

const downloadText = async (client: FtpClient, remotePath: string): Promise<string> => {
  const chunks: Buffer[] = [];
  const sink = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk);
      callback();
    }
  });
  await client.downloadTo(sink, remotePath);
  return Buffer.concat(chunks).toString('utf8');
};

/**
 * Downloads a station's newest minute files from the observatory FTP archive. One connection is
 * opened per cycle and closed when the cycle's downloads finish.
 */
export class FtpFileSource implements ObservatoryFileSource {
  private readonly access: FtpAccessOptions;
  private readonly timeoutMs: number;
  private readonly logger: ExporterLogger;
  private readonly createClient: (timeoutMs: number) => FtpClient;

  constructor(options: FtpFileSourceOptions) {
    this.access = {
      host: options.host,
      port: options.port,
      user: options.user,
      password: options.password,
      secure: options.secure
    };
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger;
    this.createClient = options.createClient ?? ((timeoutMs) => new Client(timeoutMs));
  }

  resolveRemotePath(station: StationConfig): string {
    return station.remotePath ?? station.code.toLowerCase();
  }

  async fetchRecent(station: StationConfig): Promise<RawObservatoryFile[]> {
    const remoteDir = this.resolveRemotePath(station);
    const log = this.logger.child({ station: station.code, host: this.access.host, remoteDir });
    const client = this.createClient(this.timeoutMs);

    try {
      await client.access(this.access);
      const listing = await client.list(remoteDir);
      const names = listing.filter((entry) => entry.isFile).map((entry) => entry.name);

      const selected = selectRecentFiles(names, station.code, station.lenDays);
      if (selected.length === 0) {
        log.warn('No matching observatory files found on FTP server');
        return [];
      }

      const files: RawObservatoryFile[] = [];
      for (const entry of selected) {
        const remotePath = path.posix.join(remoteDir, entry.name);
        try {
          files.push({ name: entry.name, content: await downloadText(client, remotePath) });
          log.debug({ remotePath }, 'Downloaded observatory file');
        } catch (error) {
          log.warn({ err: error, remotePath }, 'Failed to download observatory file');
        }
      }
      return files;
    } finally {
      client.close();
    }
  }
}
