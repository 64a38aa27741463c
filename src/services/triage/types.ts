// Triage Engine Types
// Alerts in, one audited decision per alert out

export const TRIAGE_ACTIONS = ['reboot', 'notify_client', 'create_ticket', 'ignore'] as const;
export type TriageAction = (typeof TRIAGE_ACTIONS)[number];

export const CONFIDENCE_LEVELS = ['High', 'Medium', 'Low'] as const;
export type Confidence = (typeof CONFIDENCE_LEVELS)[number];

export const ALERT_SEVERITIES = ['Critical', 'High', 'Medium', 'Low', 'Info'] as const;
export type AlertSeverity = (typeof ALERT_SEVERITIES)[number];

export interface Alert {
  readonly id: string;
  readonly device_name: string;
  readonly alert_type: string;
  readonly description: string;
  readonly severity: AlertSeverity;
  readonly observed_at: Date;
  readonly raw_text: string; // exactly what the classifier sees
}

export interface Decision {
  readonly action: TriageAction;
  readonly reason: string;
  readonly confidence: Confidence;
}

export type OutcomeStatus = 'success' | 'failure';

export interface ActionOutcome {
  label: string; // e.g. reboot_simulated, ticket_created, ignored
  status: OutcomeStatus;
  duration_ms: number;
  detail?: string;
}

export type AlertState =
  | 'PENDING'
  | 'CLASSIFYING'
  | 'VALIDATING'
  | 'DISPATCHING'
  | 'RECORDED';

export interface DecisionRecord {
  timestamp: string;
  alert_id: string;
  device_name: string;
  alert_type: string;
  severity: AlertSeverity;
  decision: Decision;
  outcome: ActionOutcome;
  action_taken: string;
  processing_time_ms: number;
  classifier_attempts: number;
  error_stage?: AlertState;
  error_message?: string;
}

export interface TimeSavings {
  manual_seconds_per_alert: number;
  manual_seconds_total: number;
  engine_seconds: number;
  total_saved_seconds: number;
  total_saved_minutes: number;
  per_alert_seconds: number;
  alerts_per_day: number;
  daily_projection_minutes: number;
}

export interface SessionSummary {
  record_type: 'summary';
  session_started_at: string;
  session_ended_at: string;
  session_duration_seconds: number;
  total_alerts_processed: number;
  actions_breakdown: Record<TriageAction, number>;
  outcomes_breakdown: Record<OutcomeStatus, number>;
  errors_encountered: number;
  cancelled: boolean;
  time_savings: TimeSavings;
}

// ── Collaborators ────────────────────────────────────────────────────────────

export interface AlertSource {
  next(): Promise<Alert[]>;
}

export interface ClassifierAdapter {
  name: string;
  /** Returns the raw model reply. Rejects on transport failure or timeout. */
  classify(text: string, signal?: AbortSignal): Promise<string>;
}

export interface DecisionRecorder {
  append(record: DecisionRecord): Promise<void>;
  finalize(summary: SessionSummary): Promise<void>;
}

export interface TriageConfig {
  maxClassifyAttempts: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  retryMaxTotalWaitMs: number;
  classifierTimeoutMs: number;
  actionTimeoutMs: number;
  manualSecondsPerAlert: number;
  alertsPerDay: number;
  ticketWebhookUrl: string;
  rebootWebhookUrl?: string;
  notifyWebhookUrl?: string;
  simulateActions: boolean;
  clientEmailDomain: string;
}
