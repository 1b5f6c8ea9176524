// backend/shared/src/cli/io.ts
/**
 * Operator-facing output. Logs go through the logger; banners and reports go
 * here so tests can capture them line by line.
 */

export interface CliIo {
  out(line: string): void;
  err(line: string): void;
}

export const consoleIo: CliIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

/** Collects lines in memory (tests). */
export class BufferedIo implements CliIo {
  public readonly stdout: string[] = [];
  public readonly stderr: string[] = [];

  out(line: string): void {
    this.stdout.push(...line.split("\n"));
  }

  err(line: string): void {
    this.stderr.push(...line.split("\n"));
  }
}
