import { logger } from './logger';

export interface ErrorContext {
  operation: string;
  contract?: string;
  chain?: string;
  chatId?: string;
  requestId?: string;
  additionalData?: Record<string, unknown>;
}

export interface CircuitBreakerConfig {
  failureThreshold: number;
  recoveryTimeout: number;
}

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

export class AppError extends Error {
  public readonly code: string;
  public readonly severity: ErrorSeverity;
  public readonly context: ErrorContext;
  public readonly timestamp: Date;
  public readonly recoverable: boolean;

  constructor(
    message: string,
    code: string,
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
          context,
          false
        );
      }
    }

    try {
      const result = await fn();
      this.onSuccess();
      return result;
    } catch (error) {
      this.onFailure();
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

    if (this.state === 'HALF_OPEN' || this.failures >= this.config.failureThreshold) {
      this.state = 'OPEN';
      logger.warn(`Circuit breaker opened after ${this.failures} failures`);
    }
  }

  getState(): string {
    return this.state;
  }
}

export class ErrorHandler {
  private errorCounts = new Map<string, number>();

  handleError(error: unknown, context: ErrorContext): AppError {
    const appError = this.normalizeError(error, context);
    this.logError(appError);
    this.trackError(appError);
    return appError;
  }

  normalizeError(error: unknown, context: ErrorContext): AppError {
    if (error instanceof AppError) {
      return error;
    }

    const message = error instanceof Error ? error.message : String(error);
    let severity = ErrorSeverity.MEDIUM;
    let code = 'UNKNOWN_ERROR';
    let recoverable = true;

    if (error instanceof TypeError || error instanceof ReferenceError) {
      severity = ErrorSeverity.HIGH;
      recoverable = false;
      code = 'PROGRAMMING_ERROR';
    } else if (message.includes('ECONNREFUSED') || message.includes('ETIMEDOUT')) {
      code = 'CONNECTION_ERROR';
    } else if (message.includes('rate limit') || message.includes('429')) {
      severity = ErrorSeverity.LOW;
      code = 'RATE_LIMIT_ERROR';
    } else if (message.includes('unauthorized') || message.includes('401')) {
      severity = ErrorSeverity.HIGH;
      code = 'AUTH_ERROR';
    }

    return new AppError(message, code, severity, context, recoverable);
  }

  private logError(error: AppError): void {
    const logData = {
      code: error.code,
      severity: error.severity,
      message: error.message,
      context: error.context,
      timestamp: error.timestamp,
      stack: error.stack
    };

    switch (error.severity) {
      case ErrorSeverity.CRITICAL:
        logger.error('CRITICAL ERROR', logData);
        break;
      case ErrorSeverity.HIGH:
        logger.error('High severity error', logData);
        break;
      case ErrorSeverity.MEDIUM:
        logger.warn('Medium severity error', logData);
        break;
      case ErrorSeverity.LOW:
        logger.info('Low severity error', logData);
        break;
    }
  }

  private trackError(error: AppError): void {
    const key = `${error.code}_${error.context.operation}`;
    this.errorCounts.set(key, (this.errorCounts.get(key) || 0) + 1);
  }

  getErrorStats(): Record<string, number> {
    return Object.fromEntries(this.errorCounts);
  }

  clearErrorCounts(): void {
    this.errorCounts.clear();
  }
}

export const globalErrorHandler = new ErrorHandler();

export async function withErrorHandling<T>(
  operation: () => Promise<T>,
  context: ErrorContext
): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    throw globalErrorHandler.handleError(error, context);
  }
}

export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  context: ErrorContext
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new AppError(
        `${context.operation} timed out after ${timeoutMs}ms`,
        'TIMEOUT',
        ErrorSeverity.MEDIUM,
        context
      ));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

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

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
