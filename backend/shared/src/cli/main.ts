// backend/shared/src/cli/main.ts
import { ToolError, EXIT, errorMessage } from "../errors";
import { logger } from "../logger";
import type { CliIo } from "./io";
import { consoleIo } from "./io";

export type CliCommand = (args: string[], io: CliIo) => Promise<number>;

/**
 * Entry wrapper for the cli.ts files: runs the command, maps thrown errors to
 * exit codes and sets process.exitCode (never process.exit, so pino flushes).
 */
export async function runCli(command: CliCommand, io: CliIo = consoleIo): Promise<void> {
  try {
    process.exitCode = await command(process.argv.slice(2), io);
  } catch (err) {
    io.err(`❌ ${errorMessage(err)}`);
    if (err instanceof ToolError) {
      process.exitCode = err.exitCode;
      return;
    }
    logger.error({ err }, "unhandled failure");
    process.exitCode = EXIT.Failed;
  }
}
