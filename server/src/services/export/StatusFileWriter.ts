import fs from 'node:fs';
import path from 'node:path';
import type { Logger } from 'pino';
import defaultLogger from '../../utils/logger';
import { toCompactTimestamp, toWireFormat } from '../status/statusRecord';
import type { StatusRecord } from '../status/types';

const MAX_NAME_COLLISIONS = 1000;

/**
 * File name for a record: {service_name}-status-{YYYYMMDDTHHMMSSZ}.json
 */
export function statusFileName(record: StatusRecord): string {
  return `${record.service_name}-status-${toCompactTimestamp(record.timestamp)}.json`;
}

function withSuffix(fileName: string, n: number): string {
  return n === 0 ? fileName : fileName.replace(/\.json$/, `-${n}.json`);
}

function isAlreadyExists(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'EEXIST';
}

/**
 * Writes status records as JSON files, one file per record. Files are
 * write-once: a name collision within the same second gets a -1, -2, ...
 * suffix instead of overwriting.
 */
export class StatusFileWriter {
  private readonly logger: Logger;

  constructor(private readonly outputDir: string, logger?: Logger) {
    this.logger = logger ?? defaultLogger;
  }

  /**
   * @returns path of the written file
   */
  write(record: StatusRecord): string {
    if (record.service_name.includes('/') || record.service_name.includes(path.sep)) {
      throw new Error(`Service name "${record.service_name}" cannot be used in a file name`);
    }

    fs.mkdirSync(this.outputDir, { recursive: true });

    const baseName = statusFileName(record);
    const contents = JSON.stringify(toWireFormat(record), null, 2) + '\n';

    for (let n = 0; n < MAX_NAME_COLLISIONS; n++) {
      const filePath = path.join(this.outputDir, withSuffix(baseName, n));
      try {
        fs.writeFileSync(filePath, contents, { encoding: 'utf-8', flag: 'wx' });
        this.logger.debug({ file: filePath }, 'status file written');
        return filePath;
      } catch (error) {
        if (!isAlreadyExists(error)) {
          throw error;
        }
      }
    }

    throw new Error(`Too many status files named ${baseName}`);
  }

  /**
   * Write every record; a failing record is logged and skipped.
   * @returns paths of the files that were written
   */
  writeAll(records: readonly StatusRecord[]): string[] {
    const written: string[] = [];

    for (const record of records) {
      try {
        written.push(this.write(record));
      } catch (error) {
        this.logger.error({ err: error, service: record.service_name }, 'failed to write status file');
      }
    }

    return written;
  }
}
