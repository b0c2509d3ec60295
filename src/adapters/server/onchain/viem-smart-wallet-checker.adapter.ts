// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/onchain/viem-smart-wallet-checker`
 * Purpose: Allow-list lookup against a deployed SmartWalletChecker contract via viem.
 * Scope: Calls the view function `check(address)`. Does not cache answers.
 * Invariants: Read-only contract call.
 * Side-effects: IO (RPC calls to EVM node)
 * Links: Implements WalletCheckerPort
 * @public
 */

import { createPublicClient, http, type PublicClient } from "viem";

import type { Address } from "@vote-escrow/escrow-core";

import type { WalletCheckerPort } from "@/ports";

export const SMART_WALLET_CHECKER_ABI = [
  {
    type: "function",
    name: "check",
    stateMutability: "view",
    inputs: [{ name: "addr", type: "address" }],
    outputs: [{ name: "", type: "bool" }],
  },
] as const;

export class ViemSmartWalletChecker implements WalletCheckerPort {
  private client: PublicClient | null = null;

  constructor(private readonly rpcUrl: string) {}

  private getClient(): PublicClient {
    if (this.client) {
      return this.client;
    }
    this.client = createPublicClient({ transport: http(this.rpcUrl) });
    return this.client;
  }

  async isApproved(checker: Address, account: Address): Promise<boolean> {
    return this.getClient().readContract({
      address: checker,
      abi: SMART_WALLET_CHECKER_ABI,
      functionName: "check",
      args: [account],
    });
  }
}
