import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import { JsonlDecisionRecorder, formatSummaryReport } from '../index.js';
import { summarizeSession } from '../../triage/summary.js';
import type { DecisionRecord, SessionSummary } from '../../triage/types.js';

function record(id: string): DecisionRecord {
  return {
    timestamp: '2026-10-19T08:00:00.000Z',
    alert_id: id,
    device_name: 'WS-TEST-01',
    alert_type: 'Pending Reboot',
    severity: 'High',
    decision: { action: 'reboot', reason: 'updates', confidence: 'High' },
    outcome: { label: 'reboot_simulated', status: 'success', duration_ms: 3 },
    action_taken: 'reboot_simulated',
    processing_time_ms: 3000,
    classifier_attempts: 1,
  };
}

function summaryOf(records: DecisionRecord[], cancelled = false): SessionSummary {
  return summarizeSession({
    records,
    startedAt: new Date('2026-10-19T08:00:00.000Z'),
    endedAt: new Date('2026-10-19T08:00:04.000Z'),
    manualSecondsPerAlert: 180,
    alertsPerDay: 40,
    cancelled,
  });
}

describe('JsonlDecisionRecorder', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'decision-log-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should write one JSON line per record with the summary last', async () => {
    const file = path.join(dir, 'nested', 'audit.jsonl');
    const recorder = new JsonlDecisionRecorder(file);
    const records = [record('A1'), record('A2')];

    for (const r of records) await recorder.append(r);
    await recorder.finalize(summaryOf(records));

    const lines = (await readFile(file, 'utf-8')).trimEnd().split('\n');
    expect(lines).toHaveLength(3);
    expect(JSON.parse(lines[0]).alert_id).toBe('A1');
    expect(JSON.parse(lines[1]).alert_id).toBe('A2');
    expect(JSON.parse(lines[2])).toMatchObject({ record_type: 'summary', total_alerts_processed: 2 });
  });

  it('should append to an existing log', async () => {
    const file = path.join(dir, 'audit.jsonl');
    await new JsonlDecisionRecorder(file).append(record('A1'));
    await new JsonlDecisionRecorder(file).append(record('A2'));

    const lines = (await readFile(file, 'utf-8')).trimEnd().split('\n');
    expect(lines.map(line => JSON.parse(line).alert_id)).toEqual(['A1', 'A2']);
  });
});

describe('formatSummaryReport', () => {
  it('should list totals, non-zero actions and savings', () => {
    const rule = '='.repeat(60);

    expect(formatSummaryReport(summaryOf([record('A1'), record('A2')]))).toEqual([
      rule,
      'SESSION SUMMARY',
      rule,
      'Alerts Processed: 2',
      'Session Duration: 4.0 seconds',
      'Errors: 0',
      '',
      'Actions Taken:',
      '  - Reboot: 2',
      '',
      'Time Savings:',
      '  - Manual Estimate: 360 seconds (180s per alert)',
      '  - Engine Time: 6 seconds',
      '  - Total Saved: 5.9 minutes',
      '  - Per Alert: 177 seconds saved',
      '  - Daily Projection: 118 minutes/day (40 alerts/day)',
      rule,
    ]);
  });

  it('should note an early stop', () => {
    const lines = formatSummaryReport(summaryOf([], true));

    expect(lines).toContain('Stopped early: cancellation requested');
    expect(lines).not.toContain('Actions Taken:');
  });
});
