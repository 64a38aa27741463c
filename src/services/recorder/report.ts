// Operator-facing session summary banner

import { TRIAGE_ACTIONS } from '../triage/types.js';
import type { SessionSummary, TriageAction } from '../triage/types.js';

const ACTION_TITLES: Record<TriageAction, string> = {
  reboot: 'Reboot',
  notify_client: 'Notify Client',
  create_ticket: 'Create Ticket',
  ignore: 'Ignore',
};

export function formatSummaryReport(summary: SessionSummary): string[] {
  const rule = '='.repeat(60);
  const lines = [
    rule,
    'SESSION SUMMARY',
    rule,
    `Alerts Processed: ${summary.total_alerts_processed}`,
    `Session Duration: ${summary.session_duration_seconds.toFixed(1)} seconds`,
    `Errors: ${summary.errors_encountered}`,
  ];

  if (summary.cancelled) {
    lines.push('Stopped early: cancellation requested');
  }

  const actions = TRIAGE_ACTIONS.filter(action => summary.actions_breakdown[action] > 0);
  if (actions.length > 0) {
    lines.push('', 'Actions Taken:');
    for (const action of actions) {
      lines.push(`  - ${ACTION_TITLES[action]}: ${summary.actions_breakdown[action]}`);
    }
  }

  const savings = summary.time_savings;
  lines.push(
    '',
    'Time Savings:',
    `  - Manual Estimate: ${savings.manual_seconds_total} seconds (${savings.manual_seconds_per_alert}s per alert)`,
    `  - Engine Time: ${savings.engine_seconds} seconds`,
    `  - Total Saved: ${savings.total_saved_minutes} minutes`,
    `  - Per Alert: ${savings.per_alert_seconds} seconds saved`,
    `  - Daily Projection: ${savings.daily_projection_minutes} minutes/day (${savings.alerts_per_day} alerts/day)`,
    rule
  );

  return lines;
}
