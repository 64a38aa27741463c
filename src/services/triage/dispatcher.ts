// Action Dispatcher
// Executes a validated decision exactly once and reports how it went.

import type { Logger } from 'pino';
import type { ActionHandlerTable } from '../actions/types.js';
import { ActionFailure, TriageError, describeError } from '../../utils/errors.js';
import { elapsedMs, withTimeout } from '../../utils/async.js';
import type { ActionOutcome, Alert, Decision } from './types.js';

export interface ActionDispatcherOptions {
  handlers: ActionHandlerTable;
  timeoutMs: number;
  logger: Logger;
}

export class ActionDispatcher {
  private handlers: ActionHandlerTable;
  private timeoutMs: number;
  private logger: Logger;

  constructor(options: ActionDispatcherOptions) {
    this.handlers = options.handlers;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger;
  }

  /** Never rejects: every failure becomes `status: 'failure'`. No retries. */
  async dispatch(alert: Alert, decision: Decision): Promise<ActionOutcome> {
    const handler = this.handlers[decision.action];
    const start = performance.now();

    try {
      const effect = await withTimeout(
        signal => handler.execute(alert, decision, signal),
        this.timeoutMs,
        () => TriageError.actionTimeout(this.timeoutMs)
      );

      const outcome: ActionOutcome = {
        label: effect.label,
        status: 'success',
        duration_ms: elapsedMs(start),
        ...(effect.detail !== undefined ? { detail: effect.detail } : {}),
      };
      this.logger.info(
        { alertId: alert.id, action: decision.action, label: outcome.label, durationMs: outcome.duration_ms },
        'Action executed'
      );
      return outcome;
    } catch (error) {
      const outcome: ActionOutcome = {
        label: error instanceof ActionFailure ? error.label : handler.failureLabel,
        status: 'failure',
        duration_ms: elapsedMs(start),
        detail: error instanceof ActionFailure ? error.detail : describeError(error),
      };
      this.logger.warn(
        { alertId: alert.id, action: decision.action, label: outcome.label, detail: outcome.detail },
        'Action failed'
      );
      return outcome;
    }
  }
}
