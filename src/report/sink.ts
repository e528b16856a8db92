import fs from 'fs/promises';
import path from 'path';
import dayjs from 'dayjs';
import { logger } from '../utils/logger.js';

export interface ReportSink {
  /** Persist the rendered report and return where it went. */
  write(content: string): Promise<string>;
}

export function reportFileName(prefix: string, at: Date): string {
  return `${prefix}_${dayjs(at).format('YYYYMMDD_HHmmss')}.md`;
}

export class FileReportSink implements ReportSink {
  constructor(
    private readonly outputDir: string,
    private readonly prefix = 'assignments_report',
    private readonly clock: () => Date = () => new Date()
  ) {}

  async write(content: string): Promise<string> {
    await fs.mkdir(this.outputDir, { recursive: true });
    const filePath = path.join(this.outputDir, reportFileName(this.prefix, this.clock()));
    await fs.writeFile(filePath, content, 'utf-8');
    logger.info(`Report saved to ${filePath}`);
    return filePath;
  }
}
