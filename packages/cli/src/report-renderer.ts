/**
 * @setcheck/cli — Report rendering.
 *
 * Text output lists the counts first, then every non-empty finding
 * grouped by set. JSON output is the report itself plus its fingerprint.
 */

import chalk from "chalk";
import type { ChalkInstance } from "chalk";
import type { DiscrepancyReport } from "@setcheck/verify";

export interface RenderOptions {
  readonly fingerprint?: string;
  /** Defaults to chalk's auto-detected instance */
  readonly chalk?: ChalkInstance;
}

// =============================================================================
// Text
// =============================================================================

export function renderReport(
  report: DiscrepancyReport,
  options: RenderOptions = {},
): string {
  const c = options.chalk ?? chalk;
  const { summary } = report;
  const blocks: string[][] = [];

  const summaryLines = [
    c.bold("-- Summary --"),
    `${count(c, summary.absentCount)} sets missing (no container found)`,
    `${count(c, summary.incompleteCount)} bad sets (container found, but with missing or wrong members)`,
    `${count(c, summary.missingMemberCount)} missing members`,
    `${count(c, summary.wrongDigestMemberCount)} bad members (wrong digest)`,
  ];
  if (report.unexpectedMembers !== undefined) {
    summaryLines.push(`${count(c, summary.unexpectedMemberCount)} unexpected members`);
  }
  if (summary.allVerified) {
    summaryLines.push(c.green(`All ${summary.totalItems} sets verified`));
  }
  blocks.push(summaryLines);

  if (report.absentItems.length > 0) {
    blocks.push([
      c.bold("Missing sets"),
      ...report.absentItems.map((name) => `  - ${c.red(name)}`),
    ]);
  }

  if (report.incompleteItems.length > 0) {
    blocks.push([
      c.bold("Bad sets"),
      ...report.incompleteItems.map((name) => `  - ${c.yellow(name)}`),
    ]);
  }

  // Record keys lose catalog order for numeric names; incompleteItems keeps it
  const order = report.incompleteItems;

  const missing = memberBlock(c, "Missing members", order, report.missingMembers);
  if (missing !== null) blocks.push(missing);

  const wrong = order.filter((name) => Object.hasOwn(report.wrongDigestMembers, name));
  if (wrong.length > 0) {
    const lines = [c.bold("Bad members")];
    for (const itemName of wrong) {
      const members = report.wrongDigestMembers[itemName] ?? [];
      lines.push(`  - ${itemName}`);
      for (const m of members) {
        lines.push(
          `      - ${m.member} ${c.gray(`(expected ${m.expected}, got ${m.actual})`)}`,
        );
      }
    }
    blocks.push(lines);
  }

  if (report.unexpectedMembers !== undefined) {
    const unexpected = memberBlock(
      c,
      "Unexpected members",
      order,
      report.unexpectedMembers,
    );
    if (unexpected !== null) blocks.push(unexpected);
  }

  if (report.unreadableItems.length > 0) {
    blocks.push([
      c.bold("Unreadable containers"),
      ...report.unreadableItems.map((u) => `  - ${u.itemName}: ${c.gray(u.detail)}`),
    ]);
  }

  if (options.fingerprint !== undefined) {
    blocks.push([`Report fingerprint: ${c.yellow(options.fingerprint)}`]);
  }

  return blocks.map((lines) => lines.join("\n")).join("\n\n") + "\n";
}

function count(c: ChalkInstance, n: number): string {
  return n === 0 ? String(n) : c.red.bold(String(n));
}

function memberBlock(
  c: ChalkInstance,
  title: string,
  order: readonly string[],
  byItem: Readonly<Record<string, readonly string[]>>,
): string[] | null {
  const items = order.filter((name) => Object.hasOwn(byItem, name));
  if (items.length === 0) return null;

  const lines = [c.bold(title)];
  for (const itemName of items) {
    const members = byItem[itemName] ?? [];
    lines.push(`  - ${itemName}`);
    for (const member of members) {
      lines.push(`      - ${member}`);
    }
  }
  return lines;
}

// =============================================================================
// JSON
// =============================================================================

export function renderReportJson(
  report: DiscrepancyReport,
  fingerprint: string,
): string {
  return JSON.stringify({ ...report, fingerprint }, null, 2) + "\n";
}
