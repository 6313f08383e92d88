/**
 * @settlekit/csv — Output writer.
 *
 * Renders final account state as `client,available,held,total,locked`,
 * one row per client in ascending client order.
 */

import type { Writable } from "node:stream";
import type { AccountView } from "@settlekit/ledger";
import { DEFAULT_DECIMALS, formatAmount } from "@settlekit/ledger";

export const OUTPUT_HEADER = "client,available,held,total,locked";

export function formatAccountRow(
  account: AccountView,
  decimals: number = DEFAULT_DECIMALS,
): string {
  return [
    String(account.clientId),
    formatAmount(account.available, decimals),
    formatAmount(account.held, decimals),
    formatAmount(account.total, decimals),
    String(account.locked),
  ].join(",");
}

/**
 * Render the full output document, header included, newline-terminated.
 */
export function formatAccountsCsv(
  accounts: readonly AccountView[],
  decimals: number = DEFAULT_DECIMALS,
): string {
  const rows = [...accounts]
    .sort((a, b) => a.clientId - b.clientId)
    .map((account) => formatAccountRow(account, decimals));
  return [OUTPUT_HEADER, ...rows].join("\n") + "\n";
}

/**
 * Write the output document and resolve once it has been handed to
 * the stream.
 */
export function writeAccountsCsv(
  accounts: readonly AccountView[],
  output: Writable,
  decimals: number = DEFAULT_DECIMALS,
): Promise<void> {
  const text = formatAccountsCsv(accounts, decimals);
  return new Promise((resolve, reject) => {
    output.write(text, (err) => {
      if (err) {
        reject(err);
      } else {
        resolve();
      }
    });
  });
}
