/**
 * @settlekit/verify — State hash computation.
 *
 * Algorithm:
 * 1. Canonicalize each part of the snapshot (RFC 8785 / JCS)
 * 2. SHA-256 each canonical form → part hash
 * 3. Canonicalize the part hashes and SHA-256 again → state hash
 *
 * Same snapshot → same hash, regardless of property order.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { AccountSnapshot, LedgerSnapshot } from "@settlekit/ledger";
import type { StateHash } from "./types.js";

function sha256(data: string): string {
  return createHash("sha256").update(data).digest("hex");
}

/**
 * Hash a list of account snapshots on their own.
 * Sorted by client id before hashing.
 */
export function hashAccounts(accounts: readonly AccountSnapshot[]): string {
  const sorted = [...accounts].sort((a, b) => a.clientId - b.clientId);
  return sha256(canonicalize(sorted));
}

export function hashLedgerSnapshot(snapshot: LedgerSnapshot): StateHash {
  const parts = {
    accounts: hashAccounts(snapshot.accounts),
    transactions: sha256(canonicalize(snapshot.transactions)),
    disputes: sha256(
      canonicalize({ disputed: snapshot.disputed, chargedBack: snapshot.chargedBack }),
    ),
  };

  return {
    hash: sha256(canonicalize({ version: snapshot.version, ...parts })),
    parts,
  };
}
