// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/events`
 * Purpose: Event name registry for structured logging - prevents ad-hoc strings and schema drift.
 * Scope: Define valid event names as const registry. Does not define full payload schemas.
 * Invariants: All event names registered here; logEvent() enforces base fields (opId always) and the payload shape of each operation summary.
 * Side-effects: none
 * Notes: Domain event names (deposit, withdraw, supply, admin) are written by the event sink; operation summaries by logEvent().
 * Links: Used by logEvent() in server/logEvent.ts; consumed by escrow service and event sink.
 * @public
 */

// ============================================================================
// Event Name Registry (as const)
// ============================================================================

export const EVENT_NAMES = {
  // Escrow Domain - operation summaries (logEvent)
  ESCROW_LOCK_APPLIED: "escrow.lock_applied",
  ESCROW_CHECKPOINT: "escrow.checkpoint",
  ESCROW_CONTROL_CHANGED: "escrow.control_changed",

  // Escrow Domain - committed events (event sink)
  ESCROW_DEPOSIT: "escrow.deposit",
  ESCROW_WITHDRAW: "escrow.withdraw",
  ESCROW_SUPPLY: "escrow.supply",
  ESCROW_COMMIT_OWNERSHIP: "escrow.commit_ownership",
  ESCROW_APPLY_OWNERSHIP: "escrow.apply_ownership",
  ESCROW_COMMIT_WALLET_CHECKER: "escrow.commit_wallet_checker",
  ESCROW_APPLY_WALLET_CHECKER: "escrow.apply_wallet_checker",

  // Escrow Domain - failures
  ESCROW_OPERATION_REJECTED: "escrow.operation_rejected",

  // Adapter Events
  ADAPTER_CHAIN_CLOCK_REGRESSION: "adapter.chain_clock.regression",
} as const;

export type EventName = (typeof EVENT_NAMES)[keyof typeof EVENT_NAMES];

/** Fields every logged event carries */
export interface EventBase {
  /** Correlates all log lines of one escrow operation */
  opId: string;
}

/** Payload of each operation summary written through logEvent() */
export interface EventFields {
  [EVENT_NAMES.ESCROW_LOCK_APPLIED]: {
    action: string;
    account: string;
    /** Decimal string */
    value: string;
    lockEnd: string;
    supply: string;
    epoch: number;
  };
  [EVENT_NAMES.ESCROW_CHECKPOINT]: {
    epoch: number;
    /** Global points written by this checkpoint */
    appended: number;
  };
  [EVENT_NAMES.ESCROW_CONTROL_CHANGED]: {
    action: string;
    admin: string;
    futureAdmin: string | null;
    smartWalletChecker: string | null;
    futureSmartWalletChecker: string | null;
  };
}

export type SummaryEventName = keyof EventFields;
