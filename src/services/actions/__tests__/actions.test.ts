import { describe, it, expect, vi, afterEach } from 'vitest';
import { buildClientNotification, buildTicketPayload } from '../index.js';
import { restartCommand } from '../reboot-action.js';
import { postJson } from '../http.js';
import { ActionFailure } from '../../../utils/errors.js';
import { makeAlert } from '../../triage/__tests__/fixtures.js';
import type { Decision } from '../../triage/types.js';

const decision: Decision = { action: 'create_ticket', reason: 'Needs a technician', confidence: 'Medium' };
const labels = { failureLabel: 'ticket_failed', networkLabel: 'ticket_network_error' };

describe('Ticket payload', () => {
  it('should describe the alert and the classification', () => {
    expect(buildTicketPayload(makeAlert({ severity: 'Critical' }), decision)).toEqual({
      title: 'Pending Reboot - WS-TEST-01',
      description: 'System requires restart after updates',
      priority: 'High',
      device: 'WS-TEST-01',
      alert_id: 'A1',
      alert_type: 'Pending Reboot',
      classification_reason: 'Needs a technician',
      confidence: 'Medium',
      observed_at: '2026-10-19T08:00:00.000Z',
      source: 'alert-triage',
    });
  });

  it.each([
    ['Critical', 'High'],
    ['High', 'High'],
    ['Medium', 'Medium'],
    ['Low', 'Low'],
    ['Info', 'Low'],
  ] as const)('should map %s severity to %s priority', (severity, priority) => {
    expect(buildTicketPayload(makeAlert({ severity }), decision).priority).toBe(priority);
  });
});

describe('Client notification', () => {
  it('should address the device owner', () => {
    const notification = buildClientNotification(makeAlert({ device_name: 'LT-Sales-07' }), decision, 'clients.test');

    expect(notification.to).toBe('client-lt-sales-07@clients.test');
    expect(notification.subject).toBe('Action required: Pending Reboot on LT-Sales-07');
    expect(notification.body).toBe(
      [
        'Device: LT-Sales-07',
        'Issue: Pending Reboot',
        'Details: System requires restart after updates',
        'Action required: Needs a technician',
      ].join('\n')
    );
    expect(notification.alert_id).toBe('A1');
  });
});

describe('restartCommand', () => {
  it('should target the device by name', () => {
    expect(restartCommand('FS-01')).toBe('Restart-Computer -ComputerName FS-01 -Force');
  });
});

describe('postJson', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should POST JSON and resolve with the status', async () => {
    const fetchMock = vi.fn().mockResolvedValue(new Response(null, { status: 204 }));
    vi.stubGlobal('fetch', fetchMock);

    const status = await postJson('https://hooks.test/a', { hello: 'world' }, labels);

    expect(status).toBe(204);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://hooks.test/a');
    expect(init.method).toBe('POST');
    expect(init.body).toBe('{"hello":"world"}');
    expect(init.headers['Content-Type']).toBe('application/json');
    expect(init.headers['User-Agent']).toBe('alert-triage/1.0');
  });

  it('should raise the failure label with the status on a non-2xx response', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response(null, { status: 404 })));

    const error = await postJson('https://hooks.test/a', {}, labels).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ActionFailure);
    expect(error).toMatchObject({ label: 'ticket_failed', detail: '404' });
  });

  it('should raise the network label on a transport error', async () => {
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new TypeError('fetch failed')));

    const error = await postJson('https://hooks.test/a', {}, labels).catch((e: unknown) => e);

    expect(error).toMatchObject({ label: 'ticket_network_error', detail: 'fetch failed' });
  });
});
