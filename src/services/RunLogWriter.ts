/**
 * RunLogWriter - persists one RunRecord per run as a timestamped JSON file
 */

import fs from 'fs/promises';
import path from 'path';
import { Logger } from 'winston';
import { RunRecord } from '../models';
import { createLogger } from '../utils/logger';

const pad = (value: number) => String(value).padStart(2, '0');

/**
 * run_YYYY-MM-DD_HHMMSS.json, local time
 */
export function runLogFileName(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `run_${day}_${time}.json`;
}

export class RunLogWriter {
  private logger: Logger;

  constructor(private outputDir: string) {
    this.logger = createLogger('RunLogWriter');
  }

  /**
   * Writes the record and returns the file path. Uses exclusive create, so
   * an existing log is never overwritten.
   */
  async write(record: RunRecord, date: Date = new Date()): Promise<string> {
    const dir = path.resolve(this.outputDir);
    await fs.mkdir(dir, { recursive: true });

    const filePath = path.join(dir, runLogFileName(date));
    await fs.writeFile(filePath, `${JSON.stringify(record, null, 2)}\n`, {
      encoding: 'utf8',
      flag: 'wx',
    });

    this.logger.info(`Run log saved to ${filePath}`, record.summary);
    return filePath;
  }
}
