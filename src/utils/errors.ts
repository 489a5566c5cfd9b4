/**
 * Bench Sequencer - Custom Error Classes
 *
 * Structured error handling with full context for debugging
 */

export interface ErrorContext {
  operation: string;
  input?: unknown;
  timestamp: Date;
  suggestion?: string;
  [key: string]: unknown;
}

export class AutomationError extends Error {
  public readonly code: string;
  public readonly context: ErrorContext;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: string,
    context?: Partial<ErrorContext>,
    isOperational = true
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.context = {
      operation: context?.operation || 'unknown',
      timestamp: new Date(),
      ...(context || {}),
    };
    this.isOperational = isOperational;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
    };
  }
}

// Pre-run validation errors
export class ValidationError extends AutomationError {
  public readonly violations: string[];

  constructor(message: string, context?: Partial<ErrorContext>, violations: string[] = []) {
    super(message, 'VALIDATION_ERROR', { ...context, violations });
    this.violations = violations;
  }
}

export class UnknownParameterError extends AutomationError {
  constructor(parameter: string, context: Partial<ErrorContext>) {
    super(`Unknown parameter: ${parameter}`, 'UNKNOWN_PARAMETER', { ...context, parameter });
  }
}

// Expression errors
export class EvaluationError extends AutomationError {
  public readonly expression: string;

  constructor(expression: string, reason: string, context?: Partial<ErrorContext>) {
    super(`Invalid expression '${expression}': ${reason}`, 'EVALUATION_ERROR', {
      operation: 'evaluate',
      ...context,
      expression,
    });
    this.expression = expression;
  }
}

// Instrument errors
export class InstrumentNotFoundError extends AutomationError {
  constructor(name: string, available: string[], context: Partial<ErrorContext>) {
    super(
      `Instrument '${name}' not found. Available: ${available.join(', ')}`,
      'INSTRUMENT_NOT_FOUND',
      { ...context, instrument: name, available }
    );
  }
}

export class InstrumentCapabilityError extends AutomationError {
  constructor(instrument: string, capability: string, context: Partial<ErrorContext>) {
    super(
      `Instrument '${instrument}' does not support ${capability}()`,
      'INSTRUMENT_CAPABILITY_ERROR',
      { ...context, instrument, capability }
    );
  }
}

// Block execution errors
export class BlockExecutionError extends AutomationError {
  constructor(message: string, context: Partial<ErrorContext>) {
    super(message, 'BLOCK_EXECUTION_ERROR', context);
  }
}

export class AssertionFailedError extends AutomationError {
  constructor(message: string, context: Partial<ErrorContext>) {
    super(message, 'ASSERTION_FAILED', context);
  }
}

export class TimeoutError extends AutomationError {
  constructor(operation: string, timeoutMs: number, context: Partial<ErrorContext>) {
    super(
      `Operation timed out after ${timeoutMs}ms: ${operation}`,
      'TIMEOUT_ERROR',
      { ...context, operation, timeoutMs }
    );
  }
}

// Persistence errors
export class SequenceFormatError extends AutomationError {
  constructor(message: string, context: Partial<ErrorContext>) {
    super(message, 'SEQUENCE_FORMAT_ERROR', context);
  }
}

// Error type guard
export function isAutomationError(error: unknown): error is AutomationError {
  return error instanceof AutomationError;
}

/**
 * Normalize anything a block throws into an AutomationError.
 * Errors already in the taxonomy pass through untouched.
 */
export function toBlockExecutionError(error: unknown, operation: string): AutomationError {
  if (isAutomationError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new BlockExecutionError(error.message, {
      operation,
      originalError: error.name,
      stack: error.stack,
    });
  }

  return new BlockExecutionError(String(error), {
    operation,
    originalError: String(error),
  });
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
