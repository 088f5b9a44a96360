import axios from 'axios';
import { logger } from './logger';

export interface ErrorContext {
  operation: string;
  collaborator?: string;
  wallet?: string;
  requestId?: string;
  additionalData?: Record<string, unknown>;
}

export interface CircuitBreakerConfig {
  failureThreshold: number;
  recoveryTimeout: number;
  /** Errors that do not count toward opening the circuit. Defaults to counting all. */
  isFailure?: (error: unknown) => boolean;
}

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

export type ErrorCode =
  | 'COLLABORATOR_UNAVAILABLE'
  | 'RATE_LIMITED'
  | 'INVALID_INPUT'
  | 'CONFIGURATION_MISSING'
  | 'CIRCUIT_BREAKER_OPEN'
  | 'PROGRAMMING_ERROR'
  | 'UNKNOWN_ERROR';

export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly severity: ErrorSeverity;
  public readonly context: ErrorContext;
  public readonly timestamp: Date;
  public readonly recoverable: boolean;

  constructor(
    message: string,
    code: ErrorCode,
    severity: ErrorSeverity = ErrorSeverity.MEDIUM,
    context: ErrorContext,
    recoverable: boolean = true
  ) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.severity = severity;
    this.context = context;
    this.timestamp = new Date();
    this.recoverable = recoverable;

    Error.captureStackTrace(this, AppError);
  }
}

export function invalidInput(message: string, operation: string): AppError {
  return new AppError(message, 'INVALID_INPUT', ErrorSeverity.LOW, { operation }, false);
}

export function isAppError(error: unknown, code?: ErrorCode): error is AppError {
  return error instanceof AppError && (code === undefined || error.code === code);
}

/**
 * Maps a failed outbound call onto the collaborator taxonomy. Rate limiting
 * gets its own code; every other transport or HTTP failure is treated as the
 * collaborator being unavailable for this cycle.
 */
export function toCollaboratorError(error: unknown, context: ErrorContext): AppError {
  if (error instanceof AppError) {
    return error;
  }

  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    if (status === 429) {
      return new AppError(
        `${context.collaborator ?? 'collaborator'} rate limited the request`,
        'RATE_LIMITED',
        ErrorSeverity.LOW,
        context
      );
    }

    const detail = status !== undefined ? `HTTP ${status}` : (error.code ?? error.message);
    return new AppError(
      `${context.collaborator ?? 'collaborator'} unavailable: ${detail}`,
      'COLLABORATOR_UNAVAILABLE',
      status === 401 || status === 403 ? ErrorSeverity.HIGH : ErrorSeverity.MEDIUM,
      context
    );
  }

  const message = error instanceof Error ? error.message : String(error);
  return new AppError(message, 'COLLABORATOR_UNAVAILABLE', ErrorSeverity.MEDIUM, context);
}

export class CircuitBreaker {
  private failures = 0;
  private lastFailureTime = 0;
  private state: 'CLOSED' | 'OPEN' | 'HALF_OPEN' = 'CLOSED';

  constructor(
    private config: CircuitBreakerConfig,
    private now: () => number = Date.now
  ) {}

  async execute<T>(fn: () => Promise<T>, context: ErrorContext): Promise<T> {
    if (this.state === 'OPEN') {
      if (this.now() - this.lastFailureTime > this.config.recoveryTimeout) {
        this.state = 'HALF_OPEN';
        logger.info('Circuit breaker entering HALF_OPEN state', context);
      } else {
        throw new AppError(
          'Circuit breaker is OPEN',
          'CIRCUIT_BREAKER_OPEN',
          ErrorSeverity.HIGH,
          context
        );
      }
    }

    try {
      const result = await fn();
      this.onSuccess();
      return result;
    } catch (error) {
      if (this.config.isFailure?.(error) ?? true) {
        this.onFailure();
      }
      throw error;
    }
  }

  private onSuccess(): void {
    this.failures = 0;
    this.state = 'CLOSED';
  }

  private onFailure(): void {
    this.failures++;
    this.lastFailureTime = this.now();

    if (this.failures >= this.config.failureThreshold) {
      this.state = 'OPEN';
      logger.warn(`Circuit breaker opened after ${this.failures} failures`);
    }
  }

  getState(): string {
    return this.state;
  }
}

export class ErrorHandler {
  private occurrences = new Map<string, number[]>();
  private readonly windowMs = 60 * 60 * 1000;

  constructor(private now: () => number = Date.now) {}

  handleError(error: unknown, context: ErrorContext): AppError {
    const appError = this.normalizeError(error, context);

    this.logError(appError);
    const count = this.trackError(appError);

    if (this.shouldEscalate(appError, count)) {
      logger.error('Error repeating at high frequency', {
        code: appError.code,
        operation: appError.context.operation,
        countLastHour: count
      });
    }

    return appError;
  }

  normalizeError(error: unknown, context: ErrorContext): AppError {
    if (error instanceof AppError) {
      return error;
    }

    if (axios.isAxiosError(error)) {
      return toCollaboratorError(error, context);
    }

    if (error instanceof Error) {
      if (error.name === 'TypeError' || error.name === 'ReferenceError') {
        return new AppError(error.message, 'PROGRAMMING_ERROR', ErrorSeverity.HIGH, context, false);
      }
      if (error.message.includes('ECONNREFUSED') || error.message.includes('ETIMEDOUT')) {
        return new AppError(error.message, 'COLLABORATOR_UNAVAILABLE', ErrorSeverity.MEDIUM, context);
      }
      if (error.message.includes('rate limit') || error.message.includes('429')) {
        return new AppError(error.message, 'RATE_LIMITED', ErrorSeverity.LOW, context);
      }
      return new AppError(error.message, 'UNKNOWN_ERROR', ErrorSeverity.MEDIUM, context);
    }

    return new AppError(String(error), 'UNKNOWN_ERROR', ErrorSeverity.MEDIUM, context);
  }

  private logError(error: AppError): void {
    const logData = {
      code: error.code,
      severity: error.severity,
      context: error.context
    };

    switch (error.severity) {
      case ErrorSeverity.CRITICAL:
        logger.error(`CRITICAL ERROR: ${error.message}`, { ...logData, stack: error.stack });
        break;
      case ErrorSeverity.HIGH:
        logger.error(error.message, logData);
        break;
      case ErrorSeverity.MEDIUM:
        logger.warn(error.message, logData);
        break;
      case ErrorSeverity.LOW:
        logger.info(error.message, logData);
        break;
    }
  }

  private trackError(error: AppError): number {
    const key = `${error.code}_${error.context.operation}`;
    const cutoff = this.now() - this.windowMs;
    const recent = (this.occurrences.get(key) || []).filter(time => time > cutoff);
    recent.push(this.now());
    this.occurrences.set(key, recent);
    return recent.length;
  }

  private shouldEscalate(error: AppError, count: number): boolean {
    if (error.severity === ErrorSeverity.CRITICAL) {
      return true;
    }
    if (error.severity === ErrorSeverity.HIGH) {
      return count > 10;
    }
    if (error.severity === ErrorSeverity.MEDIUM) {
      return count > 50;
    }
    return false;
  }

  getErrorStats(): Record<string, number> {
    const cutoff = this.now() - this.windowMs;
    const stats: Record<string, number> = {};
    for (const [key, times] of this.occurrences.entries()) {
      const recent = times.filter(time => time > cutoff);
      if (recent.length > 0) {
        stats[key] = recent.length;
      }
    }
    return stats;
  }
}

export const globalErrorHandler = new ErrorHandler();

export function createErrorContext(
  operation: string,
  additionalData?: Omit<ErrorContext, 'operation' | 'requestId'>
): ErrorContext {
  return {
    operation,
    requestId: `req_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`,
    ...additionalData
  };
}
