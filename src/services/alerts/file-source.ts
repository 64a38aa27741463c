import { readFile } from 'fs/promises';
import type { Logger } from 'pino';
import { logger as rootLogger } from '../../utils/logger.js';
import { TriageError, describeError } from '../../utils/errors.js';
import type { Alert, AlertSource } from '../triage/types.js';
import { parseAlert } from './schema.js';

export interface FileAlertSourceOptions {
  path: string;
  limit: number;
  logger?: Logger;
}

/**
 * Reads a JSON array of exported alerts. Order is preserved and at most
 * `limit` alerts are returned. Entries that fail validation are skipped.
 */
export class FileAlertSource implements AlertSource {
  private path: string;
  private limit: number;
  private logger: Logger;

  constructor(options: FileAlertSourceOptions) {
    this.path = options.path;
    this.limit = options.limit;
    this.logger = (options.logger ?? rootLogger).child({ component: 'alert-source' });
  }

  async next(): Promise<Alert[]> {
    let text: string;
    try {
      text = await readFile(this.path, 'utf-8');
    } catch (error) {
      throw TriageError.alertSource(`Cannot read alerts file ${this.path}: ${describeError(error)}`);
    }

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (error) {
      throw TriageError.alertSource(`Alerts file ${this.path} is not valid JSON: ${describeError(error)}`);
    }

    if (!Array.isArray(data)) {
      throw TriageError.alertSource(`Alerts file ${this.path} must contain a JSON array`);
    }

    const alerts: Alert[] = [];
    for (const [index, entry] of data.entries()) {
      if (alerts.length >= this.limit) break;

      const parsed = parseAlert(entry);
      if (parsed.ok) {
        alerts.push(parsed.alert);
      } else {
        this.logger.warn({ index, error: parsed.error }, 'Skipping invalid alert entry');
      }
    }

    this.logger.info({ path: this.path, loaded: alerts.length, available: data.length }, 'Alerts loaded');
    return alerts;
  }
}
