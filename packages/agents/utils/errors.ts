// Error hierarchy for the analytics core
// Recoverable errors become tagged ActionResult slots; the rest propagate

import { ZodError } from 'zod';
import type { ActionError, AgentErrorCode } from '../types/agents.js';

export type ErrorCode =
  | AgentErrorCode
  | 'ConfigError'
  | 'AgentRegistrationError'
  | 'InvalidRequest'
  | 'InvalidTransition';

const AGENT_ERROR_CODES: readonly AgentErrorCode[] = [
  'PermissionDenied',
  'CapabilityNotFound',
  'FeatureMismatch',
  'ModelNotFound',
  'ModelLoadFailure',
  'NumericOverflow',
  'Timeout',
  'AgentExecutionError',
  'AgentNotFound',
  'InvalidParameters',
  'DataNotFound',
];

function isAgentErrorCode(code: string): code is AgentErrorCode {
  return AGENT_ERROR_CODES.some((c) => c === code);
}

/**
 * Base error for everything raised by the analytics core.
 */
export class AnalyticsError extends Error {
  readonly code: ErrorCode;
  readonly context?: Record<string, unknown>;
  readonly recoverable: boolean;

  constructor(
    message: string,
    code: ErrorCode,
    options?: {
      cause?: unknown;
      context?: Record<string, unknown>;
      recoverable?: boolean;
    },
  ) {
    super(message);
    this.name = 'AnalyticsError';
    this.code = code;
    this.context = options?.context;
    this.recoverable = options?.recoverable ?? true;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      recoverable: this.recoverable,
    };
  }
}

export class PermissionDeniedError extends AnalyticsError {
  constructor(capability: string, required: string, granted: string) {
    super(
      `'${capability}' requires ${required}; caller has ${granted}`,
      'PermissionDenied',
      { context: { capability, required, granted } },
    );
    this.name = 'PermissionDeniedError';
  }
}

export class CapabilityNotFoundError extends AnalyticsError {
  constructor(agentId: string, capability: string) {
    super(`Agent '${agentId}' has no capability '${capability}'`, 'CapabilityNotFound', {
      context: { agentId, capability },
    });
    this.name = 'CapabilityNotFoundError';
  }
}

export class FeatureMismatchError extends AnalyticsError {
  readonly missing: readonly string[];

  constructor(modelId: string, missing: readonly string[]) {
    super(`Model '${modelId}' is missing required features: ${missing.join(', ')}`, 'FeatureMismatch', {
      context: { modelId, missing },
    });
    this.name = 'FeatureMismatchError';
    this.missing = missing;
  }
}

export class ModelNotFoundError extends AnalyticsError {
  constructor(modelId: string, detail?: string) {
    super(
      detail ? `Model '${modelId}' not found: ${detail}` : `Model '${modelId}' not found`,
      'ModelNotFound',
      { context: { modelId } },
    );
    this.name = 'ModelNotFoundError';
  }
}

export class ModelLoadFailureError extends AnalyticsError {
  constructor(modelId: string, reason: string, cause?: unknown) {
    super(`Model '${modelId}' failed to load: ${reason}`, 'ModelLoadFailure', {
      cause,
      context: { modelId, reason },
    });
    this.name = 'ModelLoadFailureError';
  }
}

export class AgentTimeoutError extends AnalyticsError {
  constructor(agentId: string, timeoutMs: number) {
    super(`Agent '${agentId}' did not respond within ${timeoutMs}ms`, 'Timeout', {
      context: { agentId, timeoutMs },
    });
    this.name = 'AgentTimeoutError';
  }
}

export class AgentExecutionError extends AnalyticsError {
  constructor(agentId: string, message: string, cause?: unknown) {
    super(message, 'AgentExecutionError', { cause, context: { agentId } });
    this.name = 'AgentExecutionError';
  }
}

export class AgentNotFoundError extends AnalyticsError {
  constructor(agentId: string) {
    super(`No agent instance '${agentId}' has been created`, 'AgentNotFound', {
      context: { agentId },
    });
    this.name = 'AgentNotFoundError';
  }
}

export class InvalidParametersError extends AnalyticsError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'InvalidParameters', { context });
    this.name = 'InvalidParametersError';
  }
}

export class DataNotFoundError extends AnalyticsError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'DataNotFound', { context });
    this.name = 'DataNotFoundError';
  }
}

export class AgentRegistrationError extends AnalyticsError {
  constructor(typeName: string, message: string) {
    super(`Agent type '${typeName}': ${message}`, 'AgentRegistrationError', {
      context: { typeName },
      recoverable: false,
    });
    this.name = 'AgentRegistrationError';
  }
}

export class InvalidRequestError extends AnalyticsError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'InvalidRequest', { context });
    this.name = 'InvalidRequestError';
  }
}

export class InvalidTransitionError extends AnalyticsError {
  constructor(from: string, to: string) {
    super(`Illegal request state transition ${from} -> ${to}`, 'InvalidTransition', {
      context: { from, to },
      recoverable: false,
    });
    this.name = 'InvalidTransitionError';
  }
}

export class ConfigError extends AnalyticsError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'ConfigError', { context, recoverable: false });
    this.name = 'ConfigError';
  }
}

export function isAnalyticsError(error: unknown): error is AnalyticsError {
  return error instanceof AnalyticsError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Map an error onto the result taxonomy. Unknown errors become AgentExecutionError.
 */
export function toActionError(error: unknown): ActionError {
  if (error instanceof ZodError) {
    return { code: 'InvalidParameters', message: formatZodError(error) };
  }
  if (isAnalyticsError(error) && isAgentErrorCode(error.code)) {
    return { code: error.code, message: error.message };
  }
  return { code: 'AgentExecutionError', message: errorMessage(error) };
}
