// backend/shared/src/errors.ts
/**
 * Purpose:
 * - Typed failures for the CLI tools. Each carries the process exit code the
 *   entrypoint should report.
 */

export const EXIT = {
  Ok: 0,
  Failed: 1,
  InvalidArgs: 2,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

export class ToolError extends Error {
  public readonly exitCode: ExitCode;

  constructor(message: string, exitCode: ExitCode = EXIT.Failed) {
    super(message);
    this.name = "ToolError";
    this.exitCode = exitCode;
  }
}

export class ArgsError extends ToolError {
  constructor(message: string) {
    super(message, EXIT.InvalidArgs);
    this.name = "ArgsError";
  }
}

export class ConfigError extends ToolError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`, EXIT.InvalidArgs);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
