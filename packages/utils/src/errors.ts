/**
 * Custom Error Classes
 * ====================
 * Standardized error classes for the risk engine and its drivers.
 */

/**
 * Base application error class
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: string = 'APP_ERROR',
    context?: Record<string, unknown>,
    isOperational: boolean = true
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;
    this.isOperational = isOperational;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      isOperational: this.isOperational,
      stack: this.stack,
    };
  }
}

/**
 * Invalid input parameters. Raised before any simulation work begins.
 */
export class ConfigError extends AppError {
  public readonly configKey?: string;

  constructor(message: string, configKey?: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', { configKey, ...context });
    this.configKey = configKey;
  }
}

/**
 * Numerical degeneracy during simulation or metric reduction
 */
export class ComputationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'COMPUTATION_ERROR', context);
  }
}

/**
 * A scenario run was aborted between batches
 */
export class SimulationCancelledError extends AppError {
  public readonly completedTrials: number;

  constructor(completedTrials: number, context?: Record<string, unknown>) {
    super('Simulation cancelled', 'SIMULATION_CANCELLED', { completedTrials, ...context });
    this.completedTrials = completedTrials;
  }
}

/**
 * Check if error is an operational error (expected errors that should be handled)
 */
export function isOperationalError(error: Error): boolean {
  if (error instanceof AppError) {
    return error.isOperational;
  }
  return false;
}
