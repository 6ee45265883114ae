/**
 * @setcheck/cli — Verification run.
 *
 * Wires the pipeline end to end:
 * dat file -> catalog -> reconciler -> zip directory -> verifier -> report.
 *
 * Every failure is caught here and mapped to an exit status, so callers
 * (main.ts, tests) only ever see a number.
 */

import type { ChalkInstance } from "chalk";
import type { DestinationStream, Logger } from "pino";
import { ZodError } from "zod";
import { loadCatalog } from "@setcheck/catalog";
import { Reconciler } from "@setcheck/reconciler";
import {
  ZipArchiveStore,
  fingerprintReport,
  verifyCatalog,
} from "@setcheck/verify";
import { SET_TYPES, USAGE, parseCliArgs } from "./config.js";
import type { CliConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { renderReport, renderReportJson } from "./report-renderer.js";

// =============================================================================
// Types
// =============================================================================

export const EXIT_CODES = {
  verified: 0,
  fatal: 1,
  discrepancies: 2,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export interface OutputStream {
  write(chunk: string): unknown;
}

export interface RunIo {
  readonly stdout: OutputStream;
  readonly stderr: OutputStream;
  readonly env?: Record<string, string | undefined>;
  /** Where log lines go; stderr when omitted */
  readonly logDestination?: DestinationStream;
  readonly chalk?: ChalkInstance;
}

/** Log verification progress once per this many items. */
export const PROGRESS_INTERVAL = 128;

// =============================================================================
// Run
// =============================================================================

export async function run(argv: readonly string[], io: RunIo): Promise<ExitCode> {
  let config: CliConfig;
  try {
    const command = parseCliArgs(argv, io.env ?? {});
    if (command.help) {
      io.stdout.write(`${USAGE}\n`);
      return EXIT_CODES.verified;
    }
    config = command.config;
  } catch (err) {
    io.stderr.write(`setcheck: ${describeUsageError(err)}\n\n${USAGE}\n`);
    return EXIT_CODES.fatal;
  }

  const logger = createLogger(config.logLevel, io.logDestination);
  try {
    return await verifyDirectory(config, logger, io);
  } catch (err) {
    logger.fatal({ err }, "Verification aborted");
    return EXIT_CODES.fatal;
  }
}

async function verifyDirectory(
  config: CliConfig,
  logger: Logger,
  io: RunIo,
): Promise<ExitCode> {
  const catalog = await loadCatalog(config.datPath);
  logger.info({ datPath: config.datPath, items: catalog.size }, "Catalog loaded");

  const convention = SET_TYPES[config.setType];
  const reconciler = new Reconciler({
    convention,
    onWarning: (warning) => {
      logger.warn({ kind: warning.kind, item: warning.itemName }, warning.message);
    },
  });
  const { effective, summary } = reconciler.reconcile(catalog);
  logger.info({ convention, ...summary }, "Catalog reconciled");

  const store = await ZipArchiveStore.open(config.romDir);
  if (!store.directoryFound) {
    logger.warn({ romDir: config.romDir }, "Archive directory not found; every set is missing");
  }
  logger.info({ romDir: config.romDir, containers: store.size }, "Archive directory listed");

  const report = await verifyCatalog(effective, store, {
    strict: config.strict,
    onProgress: ({ index, total }) => {
      if (index % PROGRESS_INTERVAL === 0 || index === total) {
        logger.debug({ index, total }, "Verification progress");
      }
    },
  });

  for (const { itemName, detail } of report.unreadableItems) {
    logger.warn({ item: itemName }, `Unreadable container: ${detail}`);
  }

  const fingerprint = fingerprintReport(report);
  io.stdout.write(
    config.format === "json"
      ? renderReportJson(report, fingerprint)
      : renderReport(report, { fingerprint, chalk: io.chalk }),
  );

  logger.info({ ...report.summary, fingerprint }, "Verification complete");
  return report.summary.allVerified
    ? EXIT_CODES.verified
    : EXIT_CODES.discrepancies;
}

function describeUsageError(err: unknown): string {
  if (err instanceof ZodError) {
    return err.issues
      .map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
      )
      .join("; ");
  }
  return err instanceof Error ? err.message : String(err);
}
