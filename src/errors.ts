/**
 * FASTQ Bench Error Hierarchy
 * Structured error types shared by every stage of a benchmark run
 */

/**
 * Base error class for all harness errors
 */
export class HarnessError extends Error {
  public readonly code: string;
  public readonly recoverable: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    recoverable: boolean = true,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'HarnessError';
    this.code = code;
    this.recoverable = recoverable;
    this.context = context;
    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      recoverable: this.recoverable,
      context: this.context,
    };
  }
}

// ==================== Setup Errors ====================

/**
 * Fatal errors raised before any scenario runs
 */
export class SetupError extends HarnessError {
  constructor(
    message: string,
    code: string = 'SETUP_ERROR',
    context?: Record<string, unknown>
  ) {
    super(message, code, false, context);
    this.name = 'SetupError';
  }
}

/**
 * Two tool executables normalize to the same identifier
 */
export class DuplicateToolError extends SetupError {
  constructor(toolId: string, paths: string[]) {
    super(
      `Duplicate tool identifier "${toolId}": ${paths.join(', ')}`,
      'DUPLICATE_TOOL',
      { toolId, paths }
    );
    this.name = 'DuplicateToolError';
  }
}

/**
 * Invalid command-line or configuration value
 */
export class InvalidArgumentError extends SetupError {
  constructor(field: string, reason: string) {
    super(
      `Invalid ${field}: ${reason}`,
      'INVALID_ARGUMENT',
      { field, reason }
    );
    this.name = 'InvalidArgumentError';
  }
}

// ==================== Scenario Errors ====================

/**
 * External data generation failed for one size
 */
export class GenerationFailure extends HarnessError {
  constructor(size: string, reason: string) {
    super(
      `Failed to generate test data for ${size}: ${reason}`,
      'GENERATION_FAILED',
      true,
      { size, reason }
    );
    this.name = 'GenerationFailure';
  }
}

/**
 * No cache strategy could produce a usable input file
 */
export class CacheStagingError extends HarnessError {
  constructor(scenarioKey: string, reason: string) {
    super(
      `Cannot stage input for ${scenarioKey}: ${reason}`,
      'CACHE_STAGING_FAILED',
      true,
      { scenarioKey, reason }
    );
    this.name = 'CacheStagingError';
  }
}

/**
 * A tool exited with a non-zero status
 */
export class ToolInvocationFailure extends HarnessError {
  constructor(toolId: string, exitCode: number) {
    super(
      `Tool ${toolId} exited with status ${exitCode}`,
      'TOOL_FAILED',
      true,
      { toolId, exitCode }
    );
    this.name = 'ToolInvocationFailure';
  }
}

/**
 * The timing engine could not produce a measurement
 */
export class TimingEngineError extends HarnessError {
  constructor(engine: string, reason: string, context?: Record<string, unknown>) {
    super(
      `${engine} failed: ${reason}`,
      'TIMING_ENGINE_FAILED',
      true,
      { engine, reason, ...context }
    );
    this.name = 'TimingEngineError';
  }
}

// ==================== Persistence Errors ====================

/**
 * Writing to the result tree failed
 */
export class PersistenceFailure extends HarnessError {
  constructor(filePath: string, reason: string) {
    super(
      `Failed to write ${filePath}: ${reason}`,
      'PERSISTENCE_FAILED',
      false,
      { filePath, reason }
    );
    this.name = 'PersistenceFailure';
  }
}

// ==================== Type Guards ====================

export function isHarnessError(error: unknown): error is HarnessError {
  return error instanceof HarnessError;
}

export function isRecoverable(error: unknown): boolean {
  if (isHarnessError(error)) {
    return error.recoverable;
  }
  return false;
}

/**
 * Errors that abort the whole run
 */
export function isFatal(error: unknown): boolean {
  return error instanceof SetupError || error instanceof PersistenceFailure;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
