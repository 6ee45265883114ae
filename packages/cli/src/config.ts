/**
 * @setcheck/cli — Configuration.
 *
 * Parses command-line arguments with node:util and validates them with Zod.
 * The log level falls back to SETCHECK_LOG_LEVEL from the environment.
 */

import { parseArgs } from "node:util";
import { z } from "zod";
import type { StorageConvention } from "@setcheck/types";

// =============================================================================
// Set Types
// =============================================================================

/** Storage convention behind each `--set-type` value. */
export const SET_TYPES = {
  nonmerged: "independent",
  merged: "parent-contains-all",
  split: "delta-only",
} as const satisfies Record<string, StorageConvention>;

export type SetType = keyof typeof SET_TYPES;

// =============================================================================
// Schema
// =============================================================================

export const CliConfigSchema = z.object({
  datPath: z.string({ required_error: "--dat <file> is required" }).min(1),
  romDir: z.string({ required_error: "<rom-dir> is required" }).min(1),
  setType: z.enum(["nonmerged", "merged", "split"]).default("nonmerged"),
  strict: z.boolean().default(false),
  format: z.enum(["text", "json"]).default("text"),
  logLevel: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("warn"),
});

export type CliConfig = z.infer<typeof CliConfigSchema>;

export type CliCommand =
  | { readonly help: true }
  | { readonly help: false; readonly config: CliConfig };

export const USAGE = `Usage: setcheck --dat <file> [options] <rom-dir>

Verifies the zip archives in <rom-dir> against a dat catalog.

Options:
  -d, --dat <file>         dat XML catalog (required)
  -t, --set-type <type>    nonmerged | merged | split (default: nonmerged)
      --strict             report members the catalog does not expect
  -f, --format <format>    text | json (default: text)
  -l, --log-level <level>  fatal | error | warn | info | debug | trace | silent
  -h, --help               show this message

Exit status: 0 all sets verified, 2 discrepancies found, 1 fatal error.`;

// =============================================================================
// Parser
// =============================================================================

/**
 * Parse and validate command-line arguments.
 *
 * @throws {TypeError} on unknown options or missing option values
 * @throws {z.ZodError} if a value is missing or out of range
 */
export function parseCliArgs(
  argv: readonly string[],
  env: Record<string, string | undefined> = process.env,
): CliCommand {
  const { values, positionals } = parseArgs({
    args: [...argv],
    options: {
      dat: { type: "string", short: "d" },
      "set-type": { type: "string", short: "t" },
      strict: { type: "boolean" },
      format: { type: "string", short: "f" },
      "log-level": { type: "string", short: "l" },
      help: { type: "boolean", short: "h" },
    },
    allowPositionals: true,
    strict: true,
  });

  if (values.help === true) {
    return { help: true };
  }

  if (positionals.length > 1) {
    throw new TypeError(
      `Expected one rom directory, got ${positionals.length}: ${positionals.join(", ")}`,
    );
  }

  const config = CliConfigSchema.parse({
    datPath: values.dat,
    romDir: positionals[0],
    setType: values["set-type"],
    strict: values.strict,
    format: values.format,
    logLevel: values["log-level"] ?? env["SETCHECK_LOG_LEVEL"],
  });

  return { help: false, config };
}
