// Alert file schema
// Exported console alerts are loosely shaped; normalise them here so the
// engine only ever sees well-formed, immutable Alerts.

import { z } from 'zod';
import { ALERT_SEVERITIES } from '../triage/types.js';
import type { Alert, AlertSeverity } from '../triage/types.js';

export function normalizeSeverity(value: unknown): AlertSeverity {
  const text = String(value ?? '').trim().toLowerCase();
  return ALERT_SEVERITIES.find(severity => severity.toLowerCase() === text) ?? 'Medium';
}

const RawAlertSchema = z
  .object({
    id: z
      .union([z.string(), z.number()])
      .transform(value => String(value).trim())
      .refine(value => value.length > 0, 'id is required'),
    device_name: z.string().trim().min(1),
    alert_type: z.string().default('Unknown'),
    description: z.string().default(''),
    severity: z.unknown().optional(),
    observed_at: z.string().optional(),
    timestamp: z.string().optional(),
    raw_text: z.string().optional(),
  })
  .transform((raw, ctx) => {
    const when = raw.observed_at ?? raw.timestamp;
    const observedAt = when ? new Date(when) : new Date(NaN);
    if (Number.isNaN(observedAt.getTime())) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'observed_at must be an ISO timestamp', path: ['observed_at'] });
      return z.NEVER;
    }

    const alert: Alert = Object.freeze({
      id: raw.id,
      device_name: raw.device_name,
      alert_type: raw.alert_type,
      description: raw.description,
      severity: normalizeSeverity(raw.severity),
      observed_at: observedAt,
      raw_text: raw.raw_text ?? `${raw.device_name}: ${raw.alert_type} - ${raw.description}`,
    });
    return alert;
  });

export type AlertParseResult = { ok: true; alert: Alert } | { ok: false; error: string };

export function parseAlert(value: unknown): AlertParseResult {
  const result = RawAlertSchema.safeParse(value);
  if (result.success) return { ok: true, alert: result.data };
  return {
    ok: false,
    error: result.error.issues.map(issue => `${issue.path.join('.') || 'alert'}: ${issue.message}`).join('; '),
  };
}
