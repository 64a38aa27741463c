// Action system types
// One handler per triage action; the dispatcher owns timing and error capture

import type { Alert, Decision, TriageAction } from '../triage/types.js';

export interface ActionEffect {
  label: string;
  detail?: string;
}

export interface ActionHandler {
  action: TriageAction;
  /** Outcome label used when the handler throws something other than an ActionFailure. */
  failureLabel: string;
  execute(alert: Alert, decision: Decision, signal: AbortSignal): Promise<ActionEffect>;
}

export type ActionHandlerTable = { [A in TriageAction]: ActionHandler & { action: A } };
