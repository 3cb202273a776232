/**
 * Typed errors for the self-update workflow
 */

export class SelfUpdateError extends Error {
  public readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'SelfUpdateError';
    this.code = code;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

export class UnknownMethodError extends SelfUpdateError {
  public readonly method: string;

  constructor(method: string) {
    super(`Selfupdate method '${method}' is not implemented`, 'UNKNOWN_METHOD');
    this.name = 'UnknownMethodError';
    this.method = method;
  }
}

export class StrategyUnavailableError extends SelfUpdateError {
  public readonly method: string;

  constructor(method: string) {
    super(`Selfupdate method '${method}' cannot be used`, 'STRATEGY_UNAVAILABLE');
    this.name = 'StrategyUnavailableError';
    this.method = method;
  }
}

export class ReexecError extends SelfUpdateError {
  public readonly spawnError?: Error;

  constructor(spawnError?: Error) {
    super("re-executing tendril failed, run 'tendril selfupdate-finish' manually", 'REEXEC_FAILED');
    this.name = 'ReexecError';
    this.spawnError = spawnError;
  }
}

export class CommandFailedError extends SelfUpdateError {
  public readonly command: string;
  public readonly exitCode: number | null;
  public readonly stderr: string;

  constructor(command: string, exitCode: number | null, stderr = '') {
    super(`Command failed with exit code ${exitCode}: ${command}`, 'COMMAND_FAILED');
    this.name = 'CommandFailedError';
    this.command = command;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

export class ConfigError extends SelfUpdateError {
  public readonly path: string;

  constructor(path: string, detail: string) {
    super(`Invalid configuration in ${path}: ${detail}`, 'CONFIG_INVALID');
    this.name = 'ConfigError';
    this.path = path;
  }
}
