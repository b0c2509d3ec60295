// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/test/wallet/fake-wallet-checker`
 * Purpose: Allow-list checker backed by in-memory sets, one per checker address.
 * Scope: Implements WalletCheckerPort. Does not make network calls.
 * Invariants: Addresses are compared in checksum form; unknown checker or account answers false.
 * Side-effects: none (in-memory only)
 * Links: Implements WalletCheckerPort
 * @public
 */

import type { Address } from "@vote-escrow/escrow-core";
import { getAddress } from "viem";

import type { WalletCheckerPort } from "@/ports";

export class FakeWalletChecker implements WalletCheckerPort {
  private readonly approved = new Map<Address, Set<Address>>();
  readonly checks: Array<{ checker: Address; account: Address }> = [];

  approve(checker: Address, account: Address): void {
    const key = getAddress(checker);
    const set = this.approved.get(key) ?? new Set<Address>();
    set.add(getAddress(account));
    this.approved.set(key, set);
  }

  revoke(checker: Address, account: Address): void {
    this.approved.get(getAddress(checker))?.delete(getAddress(account));
  }

  async isApproved(checker: Address, account: Address): Promise<boolean> {
    const entry = { checker: getAddress(checker), account: getAddress(account) };
    this.checks.push(entry);
    return this.approved.get(entry.checker)?.has(entry.account) ?? false;
  }
}
