import type { z } from 'zod';

export type TradeEngineErrorCode =
  | 'data-source-unavailable'
  | 'malformed-event'
  | 'not-found'
  | 'trader-shift-ineligible'
  | 'invalid-config';

export class TradeEngineError extends Error {
  constructor(
    public readonly code: TradeEngineErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'TradeEngineError';
  }
}

export class DataSourceUnavailableError extends TradeEngineError {
  constructor(
    public readonly owner: string,
    message: string,
  ) {
    super('data-source-unavailable', message);
    this.name = 'DataSourceUnavailableError';
  }
}

export class MalformedEventError extends TradeEngineError {
  constructor(message: string) {
    super('malformed-event', message);
    this.name = 'MalformedEventError';
  }
}

export class ShiftNotFoundError extends TradeEngineError {
  constructor(public readonly shiftIds: string[]) {
    super('not-found', `Shift not found: ${shiftIds.join(', ')}`);
    this.name = 'ShiftNotFoundError';
  }
}

export class TraderShiftIneligibleError extends TradeEngineError {
  constructor(public readonly shiftId: string) {
    super('trader-shift-ineligible', `Shift ${shiftId} is not eligible for trading`);
    this.name = 'TraderShiftIneligibleError';
  }
}

export class ConfigError extends TradeEngineError {
  constructor(
    message: string,
    public readonly issues: z.ZodIssue[] = [],
  ) {
    super('invalid-config', message);
    this.name = 'ConfigError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
