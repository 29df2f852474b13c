/**
 * Custom error hierarchy for kubemend
 */

export type ErrorCategory =
  | 'VALIDATION'
  | 'AUTHENTICATION'
  | 'KUBERNETES'
  | 'CONFIGURATION'
  | 'NETWORK'
  | 'UNKNOWN';

export type ErrorSeverity = 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';

export interface ErrorContext {
  category: ErrorCategory;
  severity: ErrorSeverity;
  retryable: boolean;
  namespace?: string;
  resourceName?: string;
  [key: string]: unknown;
}

/**
 * Base error class for kubemend
 */
export class KubemendError extends Error {
  public readonly code: string;
  public readonly context: ErrorContext;
  public readonly timestamp: Date;

  constructor(message: string, code: string, context: Partial<ErrorContext> = {}) {
    super(message);
    this.name = 'KubemendError';
    this.code = code;
    this.context = {
      ...context,
      category: context.category ?? 'UNKNOWN',
      severity: context.severity ?? 'MEDIUM',
      retryable: context.retryable ?? false,
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
 * Validation errors (user input, schema validation)
 */
export class ValidationError extends KubemendError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E1001', {
      category: 'VALIDATION',
      severity: 'LOW',
      retryable: false,
      ...context,
    });
    this.name = 'ValidationError';
  }
}

/**
 * Kubernetes errors
 */
export class KubernetesError extends KubemendError {
  constructor(message: string, code: string, context: Partial<ErrorContext> = {}) {
    super(message, code, {
      category: 'KUBERNETES',
      severity: 'HIGH',
      retryable: false,
      ...context,
    });
    this.name = 'KubernetesError';
  }
}

export class NamespaceNotAllowedError extends KubernetesError {
  constructor(namespace: string, context: Partial<ErrorContext> = {}) {
    super(`Namespace '${namespace}' is not in the allowed list`, 'E3001', {
      severity: 'HIGH',
      retryable: false,
      namespace,
      ...context,
    });
    this.name = 'NamespaceNotAllowedError';
  }
}

export class ResourceNotFoundError extends KubernetesError {
  constructor(kind: string, name: string, namespace: string, context: Partial<ErrorContext> = {}) {
    super(`${kind} '${name}' not found in namespace '${namespace}'`, 'E3004', {
      severity: 'MEDIUM',
      retryable: false,
      namespace,
      resourceName: name,
      ...context,
    });
    this.name = 'ResourceNotFoundError';
  }
}

export class ConflictRetryExhaustedError extends KubernetesError {
  public readonly attempts: number;

  constructor(
    name: string,
    namespace: string,
    attempts: number,
    lastDetail: string,
    context: Partial<ErrorContext> = {}
  ) {
    super(
      `Gave up on '${name}' in namespace '${namespace}' after ${attempts} conflicting writes: ${lastDetail}`,
      'E3005',
      {
        severity: 'MEDIUM',
        retryable: false,
        namespace,
        resourceName: name,
        ...context,
      }
    );
    this.name = 'ConflictRetryExhaustedError';
    this.attempts = attempts;
  }
}

export class TransientTransportError extends KubernetesError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E3006', {
      category: 'NETWORK',
      severity: 'MEDIUM',
      retryable: true,
      ...context,
    });
    this.name = 'TransientTransportError';
  }
}

export class KubernetesOperationError extends KubernetesError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E3007', {
      severity: 'HIGH',
      retryable: false,
      ...context,
    });
    this.name = 'KubernetesOperationError';
  }
}

export class InvalidResourceError extends KubernetesError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E3008', {
      severity: 'MEDIUM',
      retryable: false,
      ...context,
    });
    this.name = 'InvalidResourceError';
  }
}

/**
 * Authentication errors
 */
export class UnauthorizedError extends KubemendError {
  constructor(context: Partial<ErrorContext> = {}) {
    super('Unauthorized', 'E4001', {
      category: 'AUTHENTICATION',
      severity: 'MEDIUM',
      retryable: false,
      ...context,
    });
    this.name = 'UnauthorizedError';
  }
}

/**
 * Configuration errors
 */
export class ConfigurationError extends KubemendError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E6001', {
      category: 'CONFIGURATION',
      severity: 'CRITICAL',
      retryable: false,
      ...context,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * Helper to wrap unknown errors
 */
export function wrapError(error: unknown, context: Partial<ErrorContext> = {}): KubemendError {
  if (error instanceof KubemendError) {
    return error;
  }

  if (error instanceof Error) {
    return new KubemendError(error.message, 'E9999', {
      category: 'UNKNOWN',
      severity: 'MEDIUM',
      retryable: false,
      originalError: error.name,
      ...context,
    });
  }

  return new KubemendError(String(error), 'E9999', {
    category: 'UNKNOWN',
    severity: 'MEDIUM',
    retryable: false,
    ...context,
  });
}
