// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports`
 * Purpose: Hex entry file for port interfaces - canonical import surface.
 * Scope: Re-exports public port interfaces. Does not export implementations or runtime objects.
 * Invariants: Named exports only, no export *
 * Side-effects: none
 * Notes: The escrow state port lives in @vote-escrow/escrow-core beside the planner that reads it.
 * Links: Used by features and adapters for port contracts
 * @public
 */

export type { EscrowStore, EscrowView } from "@vote-escrow/escrow-core";
export type { ChainClock, ChainInstant } from "./chain-clock.port";
export type {
  EscrowEvent,
  EscrowEventSink,
  EscrowEventType,
} from "./escrow-events.port";
export type { TokenTransferPort } from "./token-transfer.port";
export type { WalletCheckerPort } from "./wallet-checker.port";
