/**
 * @settlekit/ledger — Client ledger.
 *
 * Maps client ids to account state. Exactly one account per client,
 * created lazily with zero balances on first reference.
 *
 * Rules:
 * - Accounts are never removed
 * - Callers outside the engine only ever see readonly views
 */

import type { ClientId } from "@settlekit/types";
import type { AccountView, ClientAccount } from "./types.js";

export function toAccountView(account: ClientAccount): AccountView {
  return {
    clientId: account.clientId,
    available: account.available,
    held: account.held,
    total: account.available + account.held,
    locked: account.locked,
  };
}

export class ClientLedger {
  private readonly _accounts: Map<ClientId, ClientAccount> = new Map();

  /**
   * Get the account for a client, creating an empty one if absent.
   */
  getOrCreate(clientId: ClientId): ClientAccount {
    let account = this._accounts.get(clientId);
    if (account === undefined) {
      account = { clientId, available: 0n, held: 0n, locked: false };
      this._accounts.set(clientId, account);
    }
    return account;
  }

  /**
   * Get a read-only view of a client's account.
   * Returns undefined if the client has never been referenced.
   */
  get(clientId: ClientId): AccountView | undefined {
    const account = this._accounts.get(clientId);
    return account === undefined ? undefined : toAccountView(account);
  }

  has(clientId: ClientId): boolean {
    return this._accounts.has(clientId);
  }

  /**
   * All accounts, sorted by client id.
   */
  accounts(): readonly AccountView[] {
    return [...this._accounts.values()]
      .sort((a, b) => a.clientId - b.clientId)
      .map(toAccountView);
  }

  get count(): number {
    return this._accounts.size;
  }
}
