// Response Validator
// Classifier output is untrusted: turn it into a Decision or the fallback,
// never an exception.

import { z } from 'zod';
import { CONFIDENCE_LEVELS, TRIAGE_ACTIONS } from './types.js';
import type { Confidence, Decision } from './types.js';

export const UNPARSEABLE_REASON = 'unparseable classifier response';
export const NOT_AN_OBJECT_REASON = 'classifier response is not a JSON object';

const REQUIRED_FIELDS = ['action', 'reason', 'confidence'] as const;

const ClassifierReplySchema = z.object({
  action: z.enum(TRIAGE_ACTIONS),
  reason: z.string(),
  confidence: z.unknown(),
});

export function fallbackDecision(reason: string): Decision {
  return { action: 'ignore', reason, confidence: 'Low' };
}

function extractJsonObject(raw: string): string | null {
  const start = raw.indexOf('{');
  const end = raw.lastIndexOf('}');
  if (start === -1 || end === -1 || end <= start) return null;
  return raw.slice(start, end + 1);
}

type Parsed = { ok: true; value: unknown } | { ok: false };

function parsePayload(raw: unknown): Parsed {
  if (typeof raw !== 'string') return { ok: true, value: raw };

  const json = extractJsonObject(raw.trim());
  if (json === null) return { ok: false };

  try {
    return { ok: true, value: JSON.parse(json) };
  } catch {
    return { ok: false };
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isConfidence(value: unknown): value is Confidence {
  return CONFIDENCE_LEVELS.some(level => level === value);
}

function describeValue(value: unknown): string {
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

export function validateClassifierResponse(raw: unknown): Decision {
  const parsed = parsePayload(raw);
  if (!parsed.ok) return fallbackDecision(UNPARSEABLE_REASON);
  if (!isPlainObject(parsed.value)) return fallbackDecision(NOT_AN_OBJECT_REASON);

  const data = parsed.value;
  const missing = REQUIRED_FIELDS.filter(field => data[field] === undefined || data[field] === null);
  if (missing.length > 0) {
    const noun = missing.length === 1 ? 'field' : 'fields';
    return fallbackDecision(`missing required ${noun}: ${missing.join(', ')}`);
  }

  const result = ClassifierReplySchema.safeParse(data);
  if (!result.success) {
    const invalidField = result.error.issues[0]?.path[0];
    if (invalidField === 'action') {
      return fallbackDecision(`invalid action value: ${describeValue(data.action)}`);
    }
    return fallbackDecision('invalid reason value');
  }

  const { action, reason, confidence } = result.data;
  if (!isConfidence(confidence)) {
    return {
      action,
      reason: `${reason} (confidence ${describeValue(confidence)} not recognised, using Low)`,
      confidence: 'Low',
    };
  }

  return { action, reason, confidence };
}
