// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/escrow/types`
 * Purpose: Caller context, metadata and dependency shapes for the escrow feature.
 * Scope: Type definitions only. Does not contain runtime logic.
 * Invariants: A caller is a contract whenever sender differs from origin.
 * Side-effects: none
 * Links: src/features/escrow/services/votingEscrow.ts
 * @public
 */

import type { Address } from "@vote-escrow/escrow-core";

import type {
  ChainClock,
  EscrowEventSink,
  EscrowStore,
  TokenTransferPort,
  WalletCheckerPort,
} from "@/ports";
import type { Logger } from "@/shared/observability";

export interface CallContext {
  /** Immediate caller of the operation */
  readonly sender: Address;
  /** Signer that started the call chain */
  readonly origin: Address;
}

export interface EscrowMetadata {
  readonly name: string;
  readonly symbol: string;
  readonly version: string;
  readonly decimals: number;
}

export interface VotingEscrowDeps {
  readonly store: EscrowStore;
  readonly clock: ChainClock;
  readonly token: TokenTransferPort;
  readonly walletChecker: WalletCheckerPort;
  readonly events: EscrowEventSink;
  readonly log: Logger;
}

/** Convenience for the common case of an externally owned account calling directly */
export function directCall(account: Address): CallContext {
  return { sender: account, origin: account };
}
