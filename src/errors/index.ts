// Base error class for all lintmux errors
export class LintmuxError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = 'LintmuxError';
  }
}

// Validation error for schema validation failures
export class ValidationError extends LintmuxError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

// Configuration error for config file issues
export class ConfigError extends LintmuxError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

// Processing error for business logic failures
export class ProcessingError extends LintmuxError {
  constructor(message: string) {
    super(message, 'PROCESSING_ERROR');
    this.name = 'ProcessingError';
  }
}

// The tool binary could not be spawned because it is not on PATH
export class ToolUnavailableError extends LintmuxError {
  constructor(public readonly tool: string, public readonly command: string) {
    super(`${tool}: command not found: ${command}`, 'TOOL_UNAVAILABLE');
    this.name = 'ToolUnavailableError';
  }
}

// The tool ran past its time budget and was killed
export class ToolTimeoutError extends LintmuxError {
  constructor(public readonly tool: string, public readonly timeoutMs: number) {
    super(`${tool}: timed out after ${timeoutMs}ms`, 'TOOL_TIMEOUT');
    this.name = 'ToolTimeoutError';
  }
}

// The tool produced output that does not match its declared format
export class MalformedOutputError extends LintmuxError {
  constructor(message: string, public readonly preview: string) {
    super(message, 'MALFORMED_OUTPUT');
    this.name = 'MalformedOutputError';
  }
}

// Utility function to handle unknown errors safely
export function handleUnknownError(e: unknown, context: string): Error {
  if (e instanceof Error) {
    return e;
  }
  return new Error(`${context}: ${String(e)}`);
}
