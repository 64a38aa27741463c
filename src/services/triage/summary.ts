// Session summary
// Pure function of the decision records, so the same records always give the
// same totals, histogram and savings.

import type { DecisionRecord, OutcomeStatus, SessionSummary, TriageAction } from './types.js';

export interface SummaryInput {
  records: readonly DecisionRecord[];
  startedAt: Date;
  endedAt: Date;
  manualSecondsPerAlert: number;
  alertsPerDay: number;
  cancelled: boolean;
}

const round = (value: number, digits: number) => {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};

export function emptyActionsBreakdown(): Record<TriageAction, number> {
  return { reboot: 0, notify_client: 0, create_ticket: 0, ignore: 0 };
}

export function summarizeSession(input: SummaryInput): SessionSummary {
  const actions = emptyActionsBreakdown();
  const outcomes: Record<OutcomeStatus, number> = { success: 0, failure: 0 };
  let engineMs = 0;
  let errors = 0;

  for (const record of input.records) {
    actions[record.decision.action] += 1;
    outcomes[record.outcome.status] += 1;
    engineMs += record.processing_time_ms;
    if (record.outcome.status === 'failure' || record.error_stage !== undefined) {
      errors += 1;
    }
  }

  const total = input.records.length;
  const manualTotal = total * input.manualSecondsPerAlert;
  const engineSeconds = round(engineMs / 1000, 3);
  const savedSeconds = round(manualTotal - engineSeconds, 3);
  // Savings per alert scaled to a day's alert volume
  const perAlertSeconds = total > 0 ? round(savedSeconds / total, 3) : 0;

  return {
    record_type: 'summary',
    session_started_at: input.startedAt.toISOString(),
    session_ended_at: input.endedAt.toISOString(),
    session_duration_seconds: round((input.endedAt.getTime() - input.startedAt.getTime()) / 1000, 2),
    total_alerts_processed: total,
    actions_breakdown: actions,
    outcomes_breakdown: outcomes,
    errors_encountered: errors,
    cancelled: input.cancelled,
    time_savings: {
      manual_seconds_per_alert: input.manualSecondsPerAlert,
      manual_seconds_total: manualTotal,
      engine_seconds: engineSeconds,
      total_saved_seconds: savedSeconds,
      total_saved_minutes: round(savedSeconds / 60, 1),
      per_alert_seconds: perAlertSeconds,
      alerts_per_day: input.alertsPerDay,
      daily_projection_minutes: round((perAlertSeconds * input.alertsPerDay) / 60, 1),
    },
  };
}
