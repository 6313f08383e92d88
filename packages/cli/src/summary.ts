/**
 * @settlekit/cli — Human-readable replay summary.
 */

import chalk from "chalk";
import type { ChalkInstance } from "chalk";
import type { ReplaySummary } from "./replay-runner.js";

function line(label: string, value: number, paint: ChalkInstance): string {
  return `  ${paint(label.padEnd(10))}${String(value)}`;
}

export function formatSummary(summary: ReplaySummary, colors: ChalkInstance = chalk): string {
  return [
    colors.bold("Replay complete"),
    line("rows", summary.rows, colors.gray),
    line("applied", summary.applied, colors.green),
    line("rejected", summary.rejected, summary.rejected > 0 ? colors.yellow : colors.gray),
    line("malformed", summary.malformed, summary.malformed > 0 ? colors.red : colors.gray),
    line("accounts", summary.accounts, colors.gray),
  ].join("\n");
}
