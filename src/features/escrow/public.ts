// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/escrow/public`
 * Purpose: Single entrypoint for the escrow feature - controlled API surface for the composition root and callers.
 * Scope: Re-exports the service, caller context helpers and error contracts. Does not expose internal implementation details.
 * Invariants: Single entry point per feature, stable public API, no internal structure leakage
 * Side-effects: none
 * Links: Used by src/bootstrap/container.ts
 * @public
 */

export {
  type EscrowError,
  isEscrowError,
  isInvalidStateError,
  isReentrantCallError,
  isTransferFailedError,
  isUnauthorizedError,
} from "@vote-escrow/escrow-core";
export { VotingEscrowService } from "./services/votingEscrow";
export {
  type CallContext,
  directCall,
  type EscrowMetadata,
  type VotingEscrowDeps,
} from "./types";
