import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  AgentRegistrationError, FeatureMismatchError, ModelLoadFailureError, formatZodError, toActionError,
} from '../utils/errors.js';

describe('toActionError', () => {
  it('keeps the code of agent-level errors', () => {
    expect(toActionError(new FeatureMismatchError('ridge', ['away_elo']))).toEqual({
      code: 'FeatureMismatch',
      message: "Model 'ridge' is missing required features: away_elo",
    });
  });

  it('maps validation failures to InvalidParameters', () => {
    const parsed = z.object({ week: z.number() }).safeParse({ week: 'five' });
    if (parsed.success) throw new Error('expected a validation failure');
    expect(toActionError(parsed.error)).toEqual({
      code: 'InvalidParameters',
      message: 'week: Expected number, received string',
    });
    expect(formatZodError(parsed.error)).toBe('week: Expected number, received string');
  });

  it('maps anything else to AgentExecutionError', () => {
    expect(toActionError(new RangeError('out of range'))).toEqual({
      code: 'AgentExecutionError',
      message: 'out of range',
    });
    expect(toActionError(new AgentRegistrationError('x', 'bad')).code).toBe('AgentExecutionError');
  });
});

describe('AnalyticsError', () => {
  it('serializes code, context and recoverability', () => {
    const error = new ModelLoadFailureError('xgb', 'truncated file');
    expect(error.toJSON()).toEqual({
      name: 'ModelLoadFailureError',
      code: 'ModelLoadFailure',
      message: "Model 'xgb' failed to load: truncated file",
      context: { modelId: 'xgb', reason: 'truncated file' },
      recoverable: true,
    });
  });

  it('marks registration errors as not recoverable', () => {
    expect(new AgentRegistrationError('x', 'bad').recoverable).toBe(false);
  });
});
