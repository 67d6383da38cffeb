/**
 * Custom Error Classes
 */

/**
 * Base error class for all scenecut errors
 */
export class SceneCutError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'SceneCutError';
    this.code = code;
    this.details = details;
    
    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Validation error for invalid inputs
 */
export class ValidationError extends SceneCutError {
  constructor(field: string, message: string) {
    super(
      `Validation failed for ${field}: ${message}`,
      'VALIDATION_ERROR',
      { field, message }
    );
    this.name = 'ValidationError';
  }
}

/**
 * Media metadata could not be obtained for a file
 */
export class ProbeError extends SceneCutError {
  constructor(filePath: string, reason: string, stderr?: string) {
    super(
      `Failed to probe ${filePath}: ${reason}`,
      'PROBE_ERROR',
      { filePath, reason, stderr: stderr?.substring(0, 1000) }
    );
    this.name = 'ProbeError';
  }
}

/**
 * Every detection strategy produced fewer than two boundaries
 */
export class DetectionInsufficientError extends SceneCutError {
  constructor(filePath: string, duration: number, attempted: string[]) {
    super(
      `Could not produce scene boundaries for ${filePath} (duration ${duration}s)`,
      'DETECTION_INSUFFICIENT',
      { filePath, duration, attempted }
    );
    this.name = 'DetectionInsufficientError';
  }
}

/**
 * External command error
 */
export class CommandExecutionError extends SceneCutError {
  constructor(
    command: string,
    exitCode: number,
    stderr: string
  ) {
    super(
      `Command failed with exit code ${exitCode}`,
      'COMMAND_EXECUTION_ERROR',
      { command, exitCode, stderr: stderr.substring(0, 1000) }
    );
    this.name = 'CommandExecutionError';
  }
}

/**
 * A processing run was started while another was still active on the same session
 */
export class SessionBusyError extends SceneCutError {
  constructor(sessionId: string) {
    super(
      `Session ${sessionId} is already processing`,
      'SESSION_BUSY',
      { sessionId }
    );
    this.name = 'SessionBusyError';
  }
}

/**
 * Human-readable message for anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
