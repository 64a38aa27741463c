// Engine configuration: built once from the environment, validated before a
// session starts, then passed explicitly to every component.

import { z } from 'zod';
import type { Env } from '../../env.js';
import { TriageError } from '../../utils/errors.js';
import type { TriageConfig } from './types.js';

export const DEFAULT_TRIAGE_CONFIG: TriageConfig = {
  maxClassifyAttempts: 3,
  retryBaseDelayMs: 1000,
  retryMaxDelayMs: 8000,
  retryMaxTotalWaitMs: 15000,
  classifierTimeoutMs: 30000,
  actionTimeoutMs: 30000,
  manualSecondsPerAlert: 180,
  alertsPerDay: 50,
  ticketWebhookUrl: 'https://hooks.example.com/tickets',
  simulateActions: true,
  clientEmailDomain: 'example.com',
};

const TriageConfigSchema = z.object({
  maxClassifyAttempts: z.number().int().min(1).max(10),
  retryBaseDelayMs: z.number().int().min(0),
  retryMaxDelayMs: z.number().int().min(0),
  retryMaxTotalWaitMs: z.number().int().min(0),
  classifierTimeoutMs: z.number().int().positive(),
  actionTimeoutMs: z.number().int().positive(),
  manualSecondsPerAlert: z.number().min(0),
  alertsPerDay: z.number().int().min(0),
  ticketWebhookUrl: z.string().url(),
  rebootWebhookUrl: z.string().url().optional(),
  notifyWebhookUrl: z.string().url().optional(),
  simulateActions: z.boolean(),
  clientEmailDomain: z.string().min(1),
});

export function buildTriageConfig(source: Env): TriageConfig {
  return {
    maxClassifyAttempts: source.RETRY_ATTEMPTS,
    retryBaseDelayMs: source.RETRY_BASE_DELAY_MS,
    retryMaxDelayMs: source.RETRY_MAX_DELAY_MS,
    retryMaxTotalWaitMs: source.RETRY_MAX_TOTAL_WAIT_MS,
    classifierTimeoutMs: source.CLASSIFIER_TIMEOUT_MS,
    actionTimeoutMs: source.ACTION_TIMEOUT_MS,
    manualSecondsPerAlert: source.MANUAL_SECONDS_PER_ALERT,
    alertsPerDay: source.ALERTS_PER_DAY,
    ticketWebhookUrl: source.TICKET_WEBHOOK_URL,
    rebootWebhookUrl: source.REBOOT_WEBHOOK_URL || undefined,
    notifyWebhookUrl: source.NOTIFY_WEBHOOK_URL || undefined,
    simulateActions: source.SIMULATE_ACTIONS,
    clientEmailDomain: source.CLIENT_EMAIL_DOMAIN,
  };
}

/**
 * Throws a `configuration_error` TriageError listing every invalid setting.
 */
export function validateTriageConfig(config: TriageConfig): TriageConfig {
  const result = TriageConfigSchema.safeParse(config);
  if (!result.success) {
    const problems = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw TriageError.configuration(`Invalid triage configuration (${problems.join('; ')})`, problems);
  }
  return result.data;
}
