import type { Alert, AlertSeverity, Decision } from '../triage/types.js';
import type { ActionHandler } from './types.js';
import { postJson } from './http.js';

export type TicketPriority = 'High' | 'Medium' | 'Low';

const SEVERITY_TO_PRIORITY: Record<AlertSeverity, TicketPriority> = {
  Critical: 'High',
  High: 'High',
  Medium: 'Medium',
  Low: 'Low',
  Info: 'Low',
};

export const TICKET_SOURCE = 'alert-triage';

export interface TicketPayload {
  title: string;
  description: string;
  priority: TicketPriority;
  device: string;
  alert_id: string;
  alert_type: string;
  classification_reason: string;
  confidence: Decision['confidence'];
  observed_at: string;
  source: string;
}

export function buildTicketPayload(alert: Alert, decision: Decision): TicketPayload {
  return {
    title: `${alert.alert_type} - ${alert.device_name}`,
    description: alert.description,
    priority: SEVERITY_TO_PRIORITY[alert.severity],
    device: alert.device_name,
    alert_id: alert.id,
    alert_type: alert.alert_type,
    classification_reason: decision.reason,
    confidence: decision.confidence,
    observed_at: alert.observed_at.toISOString(),
    source: TICKET_SOURCE,
  };
}

export function createTicketAction(webhookUrl: string): ActionHandler & { action: 'create_ticket' } {
  return {
    action: 'create_ticket',
    failureLabel: 'ticket_failed',
    async execute(alert, decision, signal) {
      const status = await postJson(
        webhookUrl,
        buildTicketPayload(alert, decision),
        { failureLabel: 'ticket_failed', networkLabel: 'ticket_network_error' },
        signal
      );

      return { label: 'ticket_created', detail: String(status) };
    },
  };
}
