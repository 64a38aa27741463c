import type { Alert, Decision } from '../triage/types.js';
import type { ActionHandler } from './types.js';
import { postJson } from './http.js';

export interface NotifyClientActionOptions {
  simulate: boolean;
  emailDomain: string;
  webhookUrl?: string;
}

export interface ClientNotification {
  to: string;
  subject: string;
  body: string;
  alert_id: string;
}

// Content comes entirely from the alert and decision, so building it cannot fail
export function buildClientNotification(alert: Alert, decision: Decision, emailDomain: string): ClientNotification {
  return {
    to: `client-${alert.device_name.toLowerCase()}@${emailDomain}`,
    subject: `Action required: ${alert.alert_type} on ${alert.device_name}`,
    body: [
      `Device: ${alert.device_name}`,
      `Issue: ${alert.alert_type}`,
      `Details: ${alert.description}`,
      `Action required: ${decision.reason}`,
    ].join('\n'),
    alert_id: alert.id,
  };
}

export function createNotifyClientAction(
  options: NotifyClientActionOptions
): ActionHandler & { action: 'notify_client' } {
  return {
    action: 'notify_client',
    failureLabel: 'notification_failed',
    async execute(alert, decision, signal) {
      const notification = buildClientNotification(alert, decision, options.emailDomain);
      const { webhookUrl } = options;

      if (options.simulate || !webhookUrl) {
        return { label: 'notification_sent', detail: `email to ${notification.to} (simulated)` };
      }

      await postJson(
        webhookUrl,
        notification,
        { failureLabel: 'notification_failed', networkLabel: 'notification_failed' },
        signal
      );

      return { label: 'notification_sent', detail: `email to ${notification.to}` };
    },
  };
}
