// backend/tools/server/launcher.ts
import { execaCommand } from "execa";

export interface ServerHandle {
  /** resolves with the child's exit code (1 when killed by a signal) */
  exited: Promise<number>;
  kill(signal?: NodeJS.Signals): void;
}

export type ServerLauncher = (
  command: string,
  env: Record<string, string>
) => ServerHandle;

/** Spawn the server command line with inherited stdio. */
export const execaLauncher: ServerLauncher = (command, env) => {
  const child = execaCommand(command, { stdio: "inherit", env, reject: false });
  return {
    exited: child.then((r) => (typeof r.exitCode === "number" ? r.exitCode : 1)),
    kill: (signal) => {
      child.kill(signal ?? "SIGTERM");
    },
  };
};
