// backend/shared/src/cli/args.ts
/**
 * Arg parsing (tiny, dependency-free)
 *
 *   --key value      → flags.key = ["value"]
 *   --key            → flags.key = ["true"]
 *   --no-key         → flags.key = ["false"]
 *   --key=value      → flags.key = ["value"]
 *
 * Every flag is collected as an array so repeatable flags (--only, --require)
 * need no special casing; the typed getters below pick what they need.
 */

import { ArgsError } from "../errors";

export type Flags = Record<string, string[]>;

export interface ParsedArgs {
  flags: Flags;
  positionals: string[];
}

/** Parse argv AFTER the node binary and script path have been dropped. */
export function parseArgs(args: readonly string[]): ParsedArgs {
  const flags: Flags = {};
  const positionals: string[] = [];
  const push = (k: string, v: string) => {
    (flags[k] ??= []).push(v);
  };

  for (let i = 0; i < args.length; i++) {
    const a = args[i];
    if (!a.startsWith("--")) {
      positionals.push(a);
      continue;
    }
    const body = a.slice(2);
    const eq = body.indexOf("=");
    if (eq >= 0) {
      push(body.slice(0, eq), body.slice(eq + 1));
      continue;
    }
    if (body.startsWith("no-")) {
      push(body.slice(3), "false");
      continue;
    }
    const next = args[i + 1];
    if (next == null || next.startsWith("--")) {
      push(body, "true");
    } else {
      push(body, next);
      i++;
    }
  }
  return { flags, positionals };
}

/** Fail on flags the command does not know about. */
export function assertKnownFlags(flags: Flags, known: readonly string[]): void {
  const unknown = Object.keys(flags).filter((k) => !known.includes(k));
  if (unknown.length) {
    throw new ArgsError(
      `Unknown flag(s): ${unknown.map((k) => `--${k}`).join(", ")}`
    );
  }
}

export function flagString(flags: Flags, name: string): string | undefined {
  const v = flags[name];
  return v && v.length ? v[v.length - 1] : undefined;
}

export function flagList(flags: Flags, name: string): string[] {
  return flags[name] ?? [];
}

export function flagBool(flags: Flags, name: string, def = false): boolean {
  const v = flagString(flags, name);
  if (v === undefined) return def;
  if (v === "true") return true;
  if (v === "false") return false;
  throw new ArgsError(`Invalid boolean for --${name}: "${v}"`);
}

/** Positive number of seconds, returned in ms. */
export function flagSeconds(flags: Flags, name: string): number | undefined {
  const raw = flagString(flags, name);
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!Number.isFinite(n) || n <= 0) {
    throw new ArgsError(`Invalid --${name} "${raw}": expected seconds > 0`);
  }
  return Math.round(n * 1000);
}
