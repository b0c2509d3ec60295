// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/events/log-escrow-event-sink`
 * Purpose: Publish escrow events as structured pino log lines.
 * Scope: Maps each EscrowEvent to its EVENT_NAMES key with bigint fields as decimal strings. Does not buffer.
 * Invariants: One info line per event.
 * Side-effects: IO (logging)
 * Links: Implements EscrowEventSink
 * @public
 */

import type { EscrowEvent, EscrowEventSink, EscrowEventType } from "@/ports";
import { EVENT_NAMES, type EventName, type Logger } from "@/shared/observability";

const EVENT_NAME_BY_TYPE: Record<EscrowEventType, EventName> = {
  Deposit: EVENT_NAMES.ESCROW_DEPOSIT,
  Withdraw: EVENT_NAMES.ESCROW_WITHDRAW,
  Supply: EVENT_NAMES.ESCROW_SUPPLY,
  CommitOwnership: EVENT_NAMES.ESCROW_COMMIT_OWNERSHIP,
  ApplyOwnership: EVENT_NAMES.ESCROW_APPLY_OWNERSHIP,
  CommitSmartWalletChecker: EVENT_NAMES.ESCROW_COMMIT_WALLET_CHECKER,
  ApplySmartWalletChecker: EVENT_NAMES.ESCROW_APPLY_WALLET_CHECKER,
};

/** Flatten an event into log-safe fields */
export function toLogFields(event: EscrowEvent): Record<string, unknown> {
  const fields: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(event)) {
    if (key === "type") continue;
    fields[key] = typeof value === "bigint" ? value.toString() : value;
  }
  return fields;
}

export class LogEscrowEventSink implements EscrowEventSink {
  constructor(private readonly log: Logger) {}

  publish(event: EscrowEvent): void {
    this.log.info(
      { event: EVENT_NAME_BY_TYPE[event.type], ...toLogFields(event) },
      event.type
    );
  }
}
