// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/container`
 * Purpose: Dependency injection container for application composition root with environment-based adapter selection.
 * Scope: Wire adapters to ports and build the VotingEscrowService. Does not handle request-scoped lifecycle.
 * Invariants: All ports wired; single container instance per process; escrow genesis taken from the chain clock on first access.
 * Side-effects: IO (initializes logger, reads the chain clock and emits startup log on first access)
 * Notes: Uses serverEnv.isTestMode (APP_ENV=test) to wire the fake chain clock and wallet checker.
 * Links: Used by entry points; configure adapters here for DI.
 * @public
 */

import type { Logger } from "pino";

import {
  InMemoryEscrowStore,
  InMemoryTokenVault,
  LogEscrowEventSink,
  ViemChainClock,
  ViemSmartWalletChecker,
} from "@/adapters/server";
import { FakeWalletChecker, getTestChainClock } from "@/adapters/test";
import { VotingEscrowService } from "@/features/escrow/public";
import type { ChainClock, EscrowStore, WalletCheckerPort } from "@/ports";
import { serverEnv } from "@/shared/env";
import { makeLogger } from "@/shared/observability";

export interface Container {
  log: Logger;
  clock: ChainClock;
  store: EscrowStore;
  token: InMemoryTokenVault;
  walletChecker: WalletCheckerPort;
  escrow: VotingEscrowService;
}

// Module-level singleton; a promise so concurrent first callers share one build
let _container: Promise<Container> | null = null;

/**
 * Get the singleton container instance.
 * Lazily initializes on first access.
 */
export function getContainer(): Promise<Container> {
  if (!_container) {
    _container = createContainer();
  }
  return _container;
}

/**
 * Reset the singleton container.
 * For tests only - allows fresh container between test runs.
 */
export function resetContainer(): void {
  _container = null;
}

/** Missing in production is rejected by serverEnv() */
function requireRpcUrl(url: string | undefined): string {
  if (!url) {
    throw new Error("EVM_RPC_URL is required outside test mode");
  }
  return url;
}

async function createContainer(): Promise<Container> {
  const env = serverEnv();
  const log = makeLogger({ service: env.SERVICE_NAME });

  // Startup log - confirm config (no URLs/secrets)
  log.info(
    {
      env: env.APP_ENV,
      logLevel: env.PINO_LOG_LEVEL,
      escrow: env.ESCROW_SYMBOL,
    },
    "container initialized"
  );

  // Environment-based adapter wiring - single source of truth
  const clock: ChainClock = env.isTestMode
    ? getTestChainClock()
    : new ViemChainClock(requireRpcUrl(env.EVM_RPC_URL), log);

  const walletChecker: WalletCheckerPort = env.isTestMode
    ? new FakeWalletChecker()
    : new ViemSmartWalletChecker(requireRpcUrl(env.EVM_RPC_URL));

  const genesis = await clock.current();
  const store = new InMemoryEscrowStore({
    genesis,
    admin: env.ESCROW_ADMIN_ADDRESS,
    smartWalletChecker: env.SMART_WALLET_CHECKER_ADDRESS ?? null,
  });
  const token = new InMemoryTokenVault();

  const escrow = new VotingEscrowService(
    {
      store,
      clock,
      token,
      walletChecker,
      events: new LogEscrowEventSink(log),
      log,
    },
    {
      name: env.ESCROW_NAME,
      symbol: env.ESCROW_SYMBOL,
      version: env.ESCROW_VERSION,
      decimals: env.ESCROW_TOKEN_DECIMALS,
    }
  );

  return { log, clock, store, token, walletChecker, escrow };
}
