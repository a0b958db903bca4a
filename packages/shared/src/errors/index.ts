/**
 * Custom error hierarchy for flowgauge
 */

export type ErrorCategory =
  | 'INPUT'
  | 'ADDRESS'
  | 'COLLECTOR'
  | 'CONFIGURATION'
  | 'UNKNOWN';

export type ErrorSeverity = 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';

export interface ErrorContext {
  category: ErrorCategory;
  severity: ErrorSeverity;
  fatal: boolean;
  [key: string]: unknown;
}

/**
 * Base error class for flowgauge
 */
export class FlowGaugeError extends Error {
  public readonly code: string;
  public readonly context: ErrorContext;
  public readonly timestamp: Date;

  constructor(
    message: string,
    code: string,
    context: Partial<ErrorContext> = {}
  ) {
    super(message);
    this.name = 'FlowGaugeError';
    this.code = code;
    this.context = {
      category: context.category ?? 'UNKNOWN',
      severity: context.severity ?? 'MEDIUM',
      fatal: context.fatal ?? false,
      ...context,
    };
    this.timestamp = new Date();

    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
    };
  }
}

/**
 * A `{`-prefixed line that does not decode to a flow record
 */
export class MalformedRecordError extends FlowGaugeError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = [], context: Partial<ErrorContext> = {}) {
    super(message, 'MALFORMED_RECORD', {
      category: 'INPUT',
      severity: 'LOW',
      fatal: false,
      ...context,
    });
    this.name = 'MalformedRecordError';
    this.issues = issues;
  }
}

/**
 * An endpoint address that is not a textual IPv4/IPv6 address
 */
export class InvalidAddressError extends FlowGaugeError {
  public readonly address: string;

  constructor(address: string, context: Partial<ErrorContext> = {}) {
    super(`Invalid IP address: '${address}'`, 'INVALID_ADDRESS', {
      category: 'ADDRESS',
      severity: 'LOW',
      fatal: false,
      ...context,
    });
    this.name = 'InvalidAddressError';
    this.address = address;
  }
}

/**
 * Collector process errors (spawn failure, unexpected exit)
 */
export class CollectorError extends FlowGaugeError {
  public readonly exitCode: number | null;

  constructor(message: string, exitCode: number | null = null, context: Partial<ErrorContext> = {}) {
    super(message, 'COLLECTOR_FAILED', {
      category: 'COLLECTOR',
      severity: 'CRITICAL',
      fatal: true,
      ...context,
    });
    this.name = 'CollectorError';
    this.exitCode = exitCode;
  }
}

/**
 * Configuration errors
 */
export class ConfigurationError extends FlowGaugeError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'CONFIGURATION', {
      category: 'CONFIGURATION',
      severity: 'CRITICAL',
      fatal: true,
      ...context,
    });
    this.name = 'ConfigurationError';
  }
}

export function isFlowGaugeError(error: unknown): error is FlowGaugeError {
  return error instanceof FlowGaugeError;
}

/**
 * Helper to wrap unknown errors
 */
export function wrapError(error: unknown, context: Partial<ErrorContext> = {}): FlowGaugeError {
  if (error instanceof FlowGaugeError) {
    return error;
  }

  if (error instanceof Error) {
    return new FlowGaugeError(error.message, 'UNEXPECTED', {
      category: 'UNKNOWN',
      severity: 'MEDIUM',
      fatal: false,
      originalError: error.name,
      ...context,
    });
  }

  return new FlowGaugeError(String(error), 'UNEXPECTED', {
    category: 'UNKNOWN',
    severity: 'MEDIUM',
    fatal: false,
    ...context,
  });
}
