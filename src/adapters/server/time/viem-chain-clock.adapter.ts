// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/time/viem-chain-clock`
 * Purpose: Chain clock backed by the latest block of an EVM node, read with viem.
 * Scope: Reads block number and timestamp. Does not submit transactions.
 * Invariants: Never reports an instant earlier than one it already reported (reorgs hold the last instant).
 * Side-effects: IO (RPC calls to EVM node)
 * Notes: Client is created lazily so construction never touches the network.
 * Links: Implements ChainClock port
 * @public
 */

import { createPublicClient, http, type PublicClient } from "viem";

import type { ChainClock, ChainInstant } from "@/ports";
import { EVENT_NAMES, type Logger } from "@/shared/observability";

export class ViemChainClock implements ChainClock {
  private client: PublicClient | null = null;
  private lastSeen: ChainInstant | null = null;

  constructor(
    private readonly rpcUrl: string,
    private readonly log: Logger
  ) {}

  private getClient(): PublicClient {
    if (this.client) {
      return this.client;
    }
    this.client = createPublicClient({ transport: http(this.rpcUrl) });
    return this.client;
  }

  async current(): Promise<ChainInstant> {
    const block = await this.getClient().getBlock({ blockTag: "latest" });
    const observed: ChainInstant = {
      timestamp: block.timestamp,
      blockNumber: block.number,
    };

    const last = this.lastSeen;
    if (
      last &&
      (observed.blockNumber < last.blockNumber ||
        observed.timestamp < last.timestamp)
    ) {
      this.log.warn(
        {
          event: EVENT_NAMES.ADAPTER_CHAIN_CLOCK_REGRESSION,
          observedBlock: observed.blockNumber.toString(),
          lastBlock: last.blockNumber.toString(),
        },
        "chain head moved backwards; holding last instant"
      );
      return last;
    }

    this.lastSeen = observed;
    return observed;
  }
}
