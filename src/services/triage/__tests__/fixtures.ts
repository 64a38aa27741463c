// Shared test doubles for the triage engine suites

import pino from 'pino';
import type {
  Alert,
  ClassifierAdapter,
  DecisionRecord,
  DecisionRecorder,
  SessionSummary,
  TriageConfig,
} from '../types.js';
import { DEFAULT_TRIAGE_CONFIG } from '../config.js';

export const silentLogger = pino({ level: 'silent' });

export function makeAlert(overrides: Partial<Alert> = {}): Alert {
  return {
    id: 'A1',
    device_name: 'WS-TEST-01',
    alert_type: 'Pending Reboot',
    description: 'System requires restart after updates',
    severity: 'High',
    observed_at: new Date('2026-10-19T08:00:00Z'),
    raw_text: 'WS-TEST-01: Pending Reboot - System requires restart after updates',
    ...overrides,
  };
}

export function makeAlerts(count: number): Alert[] {
  return Array.from({ length: count }, (_, i) =>
    makeAlert({ id: `A${i + 1}`, device_name: `WS-TEST-${String(i + 1).padStart(2, '0')}`, raw_text: `alert ${i + 1}` })
  );
}

export function testConfig(overrides: Partial<TriageConfig> = {}): TriageConfig {
  return {
    ...DEFAULT_TRIAGE_CONFIG,
    retryBaseDelayMs: 0,
    retryMaxDelayMs: 0,
    retryMaxTotalWaitMs: 0,
    classifierTimeoutMs: 1000,
    actionTimeoutMs: 1000,
    ticketWebhookUrl: 'https://tickets.test/hook',
    ...overrides,
  };
}

export class MemoryRecorder implements DecisionRecorder {
  records: DecisionRecord[] = [];
  summaries: SessionSummary[] = [];
  /** Every write in order, to check the summary comes last. */
  writes: Array<'record' | 'summary'> = [];

  async append(record: DecisionRecord): Promise<void> {
    this.records.push(record);
    this.writes.push('record');
  }

  async finalize(summary: SessionSummary): Promise<void> {
    this.summaries.push(summary);
    this.writes.push('summary');
  }
}

/** Classifier that replies from a script keyed by alert text. */
export class ScriptedClassifier implements ClassifierAdapter {
  name = 'scripted';
  calls: string[] = [];

  constructor(private reply: (text: string, call: number) => Promise<string>) {}

  async classify(text: string): Promise<string> {
    this.calls.push(text);
    return this.reply(text, this.calls.length);
  }
}

export const decisionJson = (action: string, confidence = 'High', reason = `chose ${action}`) =>
  JSON.stringify({ action, reason, confidence });
