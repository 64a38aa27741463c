// Triage Engine Entry Point

export { TriageEngine, classifierUnavailablePayload } from './engine.js';
export type { TriageEngineOptions } from './engine.js';
export { ActionDispatcher } from './dispatcher.js';
export { validateClassifierResponse, fallbackDecision } from './validator.js';
export { summarizeSession } from './summary.js';
export { retryWithBackoff, backoffDelay } from './retry.js';
export { buildTriageConfig, validateTriageConfig, DEFAULT_TRIAGE_CONFIG } from './config.js';

// Re-export types for convenience
export type {
  Alert,
  AlertSeverity,
  AlertSource,
  AlertState,
  ActionOutcome,
  ClassifierAdapter,
  Confidence,
  Decision,
  DecisionRecord,
  DecisionRecorder,
  SessionSummary,
  TriageAction,
  TriageConfig,
} from './types.js';
