// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/token/in-memory-token-vault`
 * Purpose: Balance book for the locked asset with an escrow custody account.
 * Scope: Moves balances between holders and custody. Does not know about locks or voting power.
 * Invariants: Balances are keyed by checksummed address; never negative; a transfer that would overdraw returns false and moves nothing.
 * Side-effects: none (in-memory only)
 * Links: Implements TokenTransferPort
 * @public
 */

import type { Address } from "@vote-escrow/escrow-core";
import { getAddress } from "viem";

import type { TokenTransferPort } from "@/ports";

export class InMemoryTokenVault implements TokenTransferPort {
  private readonly balances = new Map<Address, bigint>();
  private custody = 0n;

  /** Credit `amount` to `account` out of thin air (funding for local runs) */
  mint(account: Address, amount: bigint): void {
    const key = getAddress(account);
    this.balances.set(key, this.balanceOf(key) + amount);
  }

  balanceOf(account: Address): bigint {
    return this.balances.get(getAddress(account)) ?? 0n;
  }

  custodyBalance(): bigint {
    return this.custody;
  }

  async transferIn(from: Address, amount: bigint): Promise<boolean> {
    const key = getAddress(from);
    const balance = this.balanceOf(key);
    if (amount < 0n || balance < amount) {
      return false;
    }
    this.balances.set(key, balance - amount);
    this.custody += amount;
    return true;
  }

  async transferOut(to: Address, amount: bigint): Promise<boolean> {
    if (amount < 0n || this.custody < amount) {
      return false;
    }
    const key = getAddress(to);
    this.custody -= amount;
    this.balances.set(key, this.balanceOf(key) + amount);
    return true;
  }
}
