// JSON-lines audit trail: one line per decision, the session summary last

import { appendFile, mkdir } from 'fs/promises';
import path from 'path';
import type { DecisionRecord, DecisionRecorder, SessionSummary } from '../triage/types.js';

export class JsonlDecisionRecorder implements DecisionRecorder {
  private filePath: string;
  private ready: Promise<void> | null = null;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  async append(record: DecisionRecord): Promise<void> {
    await this.writeLine(record);
  }

  async finalize(summary: SessionSummary): Promise<void> {
    await this.writeLine(summary);
  }

  private async writeLine(entry: DecisionRecord | SessionSummary): Promise<void> {
    if (!this.ready) {
      this.ready = mkdir(path.dirname(this.filePath), { recursive: true }).then(
        () => undefined,
        (error: unknown) => {
          this.ready = null;
          throw error;
        }
      );
    }
    await this.ready;
    await appendFile(this.filePath, JSON.stringify(entry) + '\n', 'utf-8');
  }
}
