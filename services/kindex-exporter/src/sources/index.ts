import type { ExporterConfig } from '../config';
import type { ExporterLogger, ObservatoryFileSource } from '../types';
import { DirectoryFileSource } from './directorySource';
import { FtpFileSource } from './ftpSource';

export { DirectoryFileSource } from './directorySource';
export { FtpFileSource } from './ftpSource';

/** FTP archive when a host is configured, otherwise the local mirror under `dataDir`. */
export const createFileSource = (config: ExporterConfig, logger: ExporterLogger): ObservatoryFileSource =>
  config.ftp
    ? new FtpFileSource({ ...config.ftp, logger })
    : new DirectoryFileSource({ dataDir: config.dataDir, logger });
