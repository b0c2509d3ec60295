// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server`
 * Purpose: Hex entry file for server adapters - canonical import surface.
 * Scope: Re-exports only public server adapter implementations with named exports. Does not export test doubles or internal utilities.
 * Invariants: Named exports only, no export *, runtime implementations
 * Side-effects: none (at import time - adapters have runtime effects when instantiated)
 * Links: Used by bootstrap layer for DI container assembly
 * @public
 */

export {
  InMemoryEscrowStore,
  type InMemoryEscrowStoreOptions,
} from "./escrow/in-memory-escrow-store.adapter";
export {
  LogEscrowEventSink,
  toLogFields,
} from "./events/log-escrow-event-sink.adapter";
export {
  SMART_WALLET_CHECKER_ABI,
  ViemSmartWalletChecker,
} from "./onchain/viem-smart-wallet-checker.adapter";
export { ViemChainClock } from "./time/viem-chain-clock.adapter";
export { InMemoryTokenVault } from "./token/in-memory-token-vault.adapter";
