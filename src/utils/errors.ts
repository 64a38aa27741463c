// Standardized error types for the triage engine

export enum ErrorCode {
  CONFIGURATION = 'configuration_error',
  ALERT_SOURCE = 'alert_source_error',
  CLASSIFIER_TIMEOUT = 'classifier_timeout',
  CLASSIFIER_TRANSPORT = 'classifier_transport',
  CLASSIFIER_CANCELLED = 'classifier_cancelled',
  ACTION_TIMEOUT = 'action_timeout',
  SESSION_STATE = 'session_state',
  INTERNAL_ERROR = 'internal_error',
}

export class TriageError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'TriageError';
  }

  static configuration(message: string, details?: unknown): TriageError {
    return new TriageError(ErrorCode.CONFIGURATION, message, details);
  }

  static alertSource(message: string, details?: unknown): TriageError {
    return new TriageError(ErrorCode.ALERT_SOURCE, message, details);
  }

  static classifierTimeout(timeoutMs: number): TriageError {
    return new TriageError(ErrorCode.CLASSIFIER_TIMEOUT, `classifier timed out after ${timeoutMs}ms`);
  }

  static classifierTransport(message: string, details?: unknown): TriageError {
    return new TriageError(ErrorCode.CLASSIFIER_TRANSPORT, message, details);
  }

  static classifierCancelled(): TriageError {
    return new TriageError(ErrorCode.CLASSIFIER_CANCELLED, 'classification cancelled');
  }

  static actionTimeout(timeoutMs: number): TriageError {
    return new TriageError(ErrorCode.ACTION_TIMEOUT, `action timed out after ${timeoutMs}ms`);
  }

  static sessionState(message: string): TriageError {
    return new TriageError(ErrorCode.SESSION_STATE, message);
  }

  static internal(message: string = 'Internal error', details?: unknown): TriageError {
    return new TriageError(ErrorCode.INTERNAL_ERROR, message, details);
  }
}

/**
 * Raised by action handlers to report a failed effect with a specific
 * outcome label (e.g. `ticket_failed`) and detail (e.g. the HTTP status).
 */
export class ActionFailure extends Error {
  constructor(
    public label: string,
    public detail: string
  ) {
    super(`${label}: ${detail}`);
    this.name = 'ActionFailure';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}

// Process exit codes for session-level aborts
export const EXIT_OK = 0;
export const EXIT_CONFIGURATION = 2;
export const EXIT_ALERT_SOURCE = 3;
export const EXIT_INTERNAL = 1;
export const EXIT_CANCELLED = 130;

export function exitCodeFor(error: unknown): number {
  if (error instanceof TriageError) {
    switch (error.code) {
      case ErrorCode.CONFIGURATION:
        return EXIT_CONFIGURATION;
      case ErrorCode.ALERT_SOURCE:
        return EXIT_ALERT_SOURCE;
      default:
        return EXIT_INTERNAL;
    }
  }
  return EXIT_INTERNAL;
}
