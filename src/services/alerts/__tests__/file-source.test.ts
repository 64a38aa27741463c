import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { FileAlertSource, normalizeSeverity, parseAlert } from '../index.js';
import { ErrorCode, TriageError } from '../../../utils/errors.js';
import { silentLogger } from '../../triage/__tests__/fixtures.js';

const entry = (id: string, extra: Record<string, unknown> = {}) => ({
  id,
  device_name: `WS-${id}`,
  alert_type: 'Disk Space Low',
  description: 'C: drive at 95%',
  severity: 'Medium',
  observed_at: '2026-10-19T09:00:00Z',
  ...extra,
});

describe('parseAlert', () => {
  it('should build an alert with derived raw text', () => {
    const result = parseAlert(entry('A1'));

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.alert).toEqual({
      id: 'A1',
      device_name: 'WS-A1',
      alert_type: 'Disk Space Low',
      description: 'C: drive at 95%',
      severity: 'Medium',
      observed_at: new Date('2026-10-19T09:00:00Z'),
      raw_text: 'WS-A1: Disk Space Low - C: drive at 95%',
    });
    expect(Object.isFrozen(result.alert)).toBe(true);
  });

  it('should accept numeric ids and the legacy timestamp field', () => {
    const result = parseAlert({ id: 42, device_name: 'PRN-01', timestamp: '2026-10-19T09:30:00Z' });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.alert.id).toBe('42');
    expect(result.alert.alert_type).toBe('Unknown');
    expect(result.alert.description).toBe('');
    expect(result.alert.observed_at.toISOString()).toBe('2026-10-19T09:30:00.000Z');
  });

  it('should keep raw text exactly as exported', () => {
    const result = parseAlert(entry('A1', { raw_text: 'custom text' }));
    expect(result.ok && result.alert.raw_text).toBe('custom text');
  });

  it('should reject entries without a device', () => {
    const result = parseAlert({ id: 'A1', observed_at: '2026-10-19T09:00:00Z' });
    expect(result.ok).toBe(false);
  });

  it('should reject entries without a usable timestamp', () => {
    const result = parseAlert(entry('A1', { observed_at: 'yesterday' }));

    expect(result).toEqual({ ok: false, error: 'observed_at: observed_at must be an ISO timestamp' });
  });

  it('should reject blank ids', () => {
    expect(parseAlert(entry('  ')).ok).toBe(false);
  });
});

describe('normalizeSeverity', () => {
  it('should match severities case-insensitively', () => {
    expect(normalizeSeverity('critical')).toBe('Critical');
    expect(normalizeSeverity(' INFO ')).toBe('Info');
  });

  it('should default unknown severities to Medium', () => {
    expect(normalizeSeverity('urgent')).toBe('Medium');
    expect(normalizeSeverity(undefined)).toBe('Medium');
  });
});

describe('FileAlertSource', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'alert-source-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function sourceFor(content: string, limit = 10) {
    const file = path.join(dir, 'alerts.json');
    await writeFile(file, content, 'utf-8');
    return new FileAlertSource({ path: file, limit, logger: silentLogger });
  }

  it('should load alerts in file order and skip invalid entries', async () => {
    const source = await sourceFor(JSON.stringify([entry('A1'), { id: 'broken' }, entry('A2'), entry('A3')]));

    const alerts = await source.next();

    expect(alerts.map(a => a.id)).toEqual(['A1', 'A2', 'A3']);
  });

  it('should return at most the configured number of alerts', async () => {
    const source = await sourceFor(JSON.stringify([entry('A1'), entry('A2'), entry('A3')]), 2);

    expect((await source.next()).map(a => a.id)).toEqual(['A1', 'A2']);
  });

  it('should return nothing for an empty array', async () => {
    const source = await sourceFor('[]');
    expect(await source.next()).toEqual([]);
  });

  it('should fail with an alert source error when the file is missing', async () => {
    const source = new FileAlertSource({ path: path.join(dir, 'missing.json'), limit: 10, logger: silentLogger });

    const error = await source.next().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TriageError);
    expect(error).toMatchObject({ code: ErrorCode.ALERT_SOURCE });
  });

  it('should fail on malformed JSON', async () => {
    const source = await sourceFor('[{"id":');
    await expect(source.next()).rejects.toThrow(/is not valid JSON/);
  });

  it('should fail when the root is not an array', async () => {
    const source = await sourceFor('{"alerts":[]}');
    await expect(source.next()).rejects.toThrow(/must contain a JSON array/);
  });

  it('should load the bundled demo alerts', async () => {
    const source = new FileAlertSource({ path: 'data/demo_alerts.json', limit: 100, logger: silentLogger });

    const alerts = await source.next();

    expect(alerts).toHaveLength(10);
    expect(alerts[0].id).toBe('ALT-1001');
    expect(alerts[9].id).toBe('ALT-1010');
  });
});
