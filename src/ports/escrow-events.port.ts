// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/escrow-events.port`
 * Purpose: Typed events published after each committed escrow mutation.
 * Scope: Event union and sink interface. Does not decide where events go.
 * Invariants: Events are published only for committed operations, in commit order.
 * Side-effects: none (interface only)
 * Links: Implemented by LogEscrowEventSink and RecordingEventSink
 * @public
 */

import type { Address, DepositType } from "@vote-escrow/escrow-core";

export type EscrowEvent =
  | {
      readonly type: "Deposit";
      readonly provider: Address;
      readonly value: bigint;
      readonly locktime: bigint;
      readonly depositType: DepositType;
      readonly ts: bigint;
    }
  | {
      readonly type: "Withdraw";
      readonly provider: Address;
      readonly value: bigint;
      readonly ts: bigint;
    }
  | {
      readonly type: "Supply";
      readonly prevSupply: bigint;
      readonly supply: bigint;
    }
  | { readonly type: "CommitOwnership"; readonly admin: Address }
  | { readonly type: "ApplyOwnership"; readonly admin: Address }
  | { readonly type: "CommitSmartWalletChecker"; readonly checker: Address }
  | { readonly type: "ApplySmartWalletChecker"; readonly checker: Address | null };

export type EscrowEventType = EscrowEvent["type"];

export interface EscrowEventSink {
  publish(event: EscrowEvent): void;
}
