// Triage Engine
// Sequential per-alert state machine:
//   PENDING -> CLASSIFYING -> VALIDATING -> DISPATCHING -> RECORDED
// Every alert handed to run() before cancellation ends RECORDED, with exactly
// one DecisionRecord, whatever its collaborators do.

import type { Logger } from 'pino';
import { logger as rootLogger } from '../../utils/logger.js';
import { TriageError, describeError } from '../../utils/errors.js';
import { elapsedMs, withTimeout } from '../../utils/async.js';
import { createActionHandlers } from '../actions/index.js';
import { validateTriageConfig } from './config.js';
import { ActionDispatcher } from './dispatcher.js';
import { retryWithBackoff } from './retry.js';
import type { RetryResult } from './retry.js';
import { summarizeSession } from './summary.js';
import { fallbackDecision, validateClassifierResponse } from './validator.js';
import type {
  ActionOutcome,
  Alert,
  AlertState,
  ClassifierAdapter,
  Decision,
  DecisionRecord,
  DecisionRecorder,
  SessionSummary,
  TriageConfig,
} from './types.js';

const STATE_ORDER: readonly AlertState[] = ['PENDING', 'CLASSIFYING', 'VALIDATING', 'DISPATCHING', 'RECORDED'];

export interface TriageEngineOptions {
  config: TriageConfig;
  classifier: ClassifierAdapter;
  recorder: DecisionRecorder;
  dispatcher?: ActionDispatcher;
  logger?: Logger;
}

interface ClassificationResult {
  payload: string;
  attempts: number;
}

export function classifierUnavailablePayload(result: Extract<RetryResult<string>, { ok: false }>): string {
  const cause = describeError(result.cancelled ? TriageError.classifierCancelled() : result.error);
  return JSON.stringify({
    action: 'ignore',
    reason: `classifier unavailable after ${result.attempts} attempt(s): ${cause}`,
    confidence: 'Low',
  });
}

export class TriageEngine {
  private config: TriageConfig;
  private classifier: ClassifierAdapter;
  private recorder: DecisionRecorder;
  private dispatcher: ActionDispatcher;
  private logger: Logger;
  private cancellation = new AbortController();
  private started = false;

  constructor(options: TriageEngineOptions) {
    // Misconfiguration aborts here, before any alert is touched
    this.config = validateTriageConfig(options.config);
    this.classifier = options.classifier;
    this.recorder = options.recorder;
    this.logger = (options.logger ?? rootLogger).child({ component: 'triage-engine' });
    this.dispatcher =
      options.dispatcher ??
      new ActionDispatcher({
        handlers: createActionHandlers(this.config),
        timeoutMs: this.config.actionTimeoutMs,
        logger: this.logger.child({ component: 'action-dispatcher' }),
      });
  }

  get cancelled(): boolean {
    return this.cancellation.signal.aborted;
  }

  /**
   * Cooperative early termination. The alert in flight still reaches
   * RECORDED; no further classifier attempt or alert starts; the summary is
   * persisted once.
   */
  cancel(reason = 'cancellation requested'): void {
    if (this.cancelled) return;
    this.logger.warn({ reason }, 'Cancellation requested, finishing current alert');
    this.cancellation.abort(reason);
  }

  async run(alerts: readonly Alert[]): Promise<SessionSummary> {
    if (this.started) {
      throw TriageError.sessionState('A triage engine runs a single session');
    }
    this.started = true;

    const startedAt = new Date();
    const records: DecisionRecord[] = [];

    for (const [index, alert] of alerts.entries()) {
      if (this.cancelled) {
        this.logger.warn({ processed: index, total: alerts.length }, 'Stopping early');
        break;
      }

      this.logger.info(
        { alertId: alert.id, device: alert.device_name, type: alert.alert_type, position: `${index + 1}/${alerts.length}` },
        'Processing alert'
      );

      const record = await this.processAlert(alert);
      records.push(record);
      await this.persist('append', () => this.recorder.append(record), alert.id);
    }

    const summary = summarizeSession({
      records,
      startedAt,
      endedAt: new Date(),
      manualSecondsPerAlert: this.config.manualSecondsPerAlert,
      alertsPerDay: this.config.alertsPerDay,
      cancelled: this.cancelled,
    });

    await this.persist('finalize', () => this.recorder.finalize(summary));
    this.logger.info(
      { processed: summary.total_alerts_processed, savedMinutes: summary.time_savings.total_saved_minutes },
      'Session complete'
    );

    return summary;
  }

  private async processAlert(alert: Alert): Promise<DecisionRecord> {
    const start = performance.now();
    let state: AlertState = 'PENDING';
    let decision: Decision | undefined;
    let attempts = 0;

    try {
      state = this.transition(alert, state, 'CLASSIFYING');
      const classified = await this.classify(alert);
      attempts = classified.attempts;

      state = this.transition(alert, state, 'VALIDATING');
      decision = validateClassifierResponse(classified.payload);

      state = this.transition(alert, state, 'DISPATCHING');
      const outcome = await this.dispatcher.dispatch(alert, decision);

      const record = this.buildRecord(alert, decision, outcome, elapsedMs(start), attempts);
      this.transition(alert, state, 'RECORDED');
      return record;
    } catch (error) {
      const message = describeError(error);
      this.logger.error({ alertId: alert.id, stage: state, err: error }, 'Alert processing failed');

      const outcome: ActionOutcome = {
        label: 'processing_failed',
        status: 'failure',
        duration_ms: 0,
        detail: message,
      };
      const record = this.buildRecord(
        alert,
        decision ?? fallbackDecision(`processing failed: ${message}`),
        outcome,
        elapsedMs(start),
        attempts
      );
      record.error_stage = state;
      record.error_message = message;
      return record;
    }
  }

  private async classify(alert: Alert): Promise<ClassificationResult> {
    const timeoutMs = this.config.classifierTimeoutMs;

    const result = await retryWithBackoff(
      () =>
        withTimeout(
          signal => this.classifier.classify(alert.raw_text, signal),
          timeoutMs,
          () => TriageError.classifierTimeout(timeoutMs)
        ),
      {
        attempts: this.config.maxClassifyAttempts,
        baseDelayMs: this.config.retryBaseDelayMs,
        maxDelayMs: this.config.retryMaxDelayMs,
        maxTotalWaitMs: this.config.retryMaxTotalWaitMs,
      },
      {
        signal: this.cancellation.signal,
        onRetry: ({ attempt, delayMs, error }) =>
          this.logger.warn(
            { alertId: alert.id, attempt, delayMs, error: describeError(error) },
            'Classifier call failed, retrying'
          ),
      }
    );

    if (result.ok) {
      return { payload: result.value, attempts: result.attempts };
    }

    this.logger.error(
      { alertId: alert.id, attempts: result.attempts, cancelled: result.cancelled, error: describeError(result.error) },
      'Classifier unavailable, degrading to ignore'
    );
    return { payload: classifierUnavailablePayload(result), attempts: result.attempts };
  }

  private transition(alert: Alert, from: AlertState, to: AlertState): AlertState {
    if (STATE_ORDER.indexOf(to) <= STATE_ORDER.indexOf(from)) {
      throw TriageError.internal(`Illegal transition ${from} -> ${to} for alert ${alert.id}`);
    }
    this.logger.debug({ alertId: alert.id, from, to }, 'State transition');
    return to;
  }

  private buildRecord(
    alert: Alert,
    decision: Decision,
    outcome: ActionOutcome,
    processingMs: number,
    attempts: number
  ): DecisionRecord {
    return {
      timestamp: new Date().toISOString(),
      alert_id: alert.id,
      device_name: alert.device_name,
      alert_type: alert.alert_type,
      severity: alert.severity,
      decision,
      outcome,
      action_taken: outcome.label,
      processing_time_ms: processingMs,
      classifier_attempts: attempts,
    };
  }

  // Recorder failures are reported, never escalated
  private async persist(operation: 'append' | 'finalize', write: () => Promise<void>, alertId?: string): Promise<void> {
    try {
      await write();
    } catch (error) {
      this.logger.error({ operation, alertId, err: error }, 'Decision recorder failed');
    }
  }
}
