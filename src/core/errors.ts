/**
 * Error that terminates a CLI command with a specific exit code.
 * The message is printed to stderr as `Error: <message>`.
 */
export class CliError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode = 1) {
    super(message);
    this.name = "CliError";
    this.exitCode = exitCode;
  }
}

/**
 * Bad invocation: unknown command or option, missing required option or value.
 * Printed together with a usage line and a help hint.
 */
export class UsageError extends CliError {
  /** Command the usage line refers to; undefined for the top level. */
  readonly command?: string;

  constructor(message: string, command?: string) {
    super(message, 2);
    this.name = "UsageError";
    this.command = command;
  }
}

/**
 * Missing or invalid configuration (credentials, endpoint, flag combinations).
 */
export class ConfigError extends CliError {
  constructor(message: string) {
    super(message, 1);
    this.name = "ConfigError";
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
