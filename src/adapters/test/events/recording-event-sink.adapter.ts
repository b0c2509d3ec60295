// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/test/events/recording-event-sink`
 * Purpose: Event sink that keeps published escrow events for assertions.
 * Scope: Implements EscrowEventSink. Does not log.
 * Invariants: Events kept in publish order.
 * Side-effects: none (in-memory only)
 * Links: Implements EscrowEventSink
 * @public
 */

import type { EscrowEvent, EscrowEventSink, EscrowEventType } from "@/ports";

export class RecordingEventSink implements EscrowEventSink {
  readonly events: EscrowEvent[] = [];

  publish(event: EscrowEvent): void {
    this.events.push(event);
  }

  ofType<T extends EscrowEventType>(
    type: T
  ): Array<Extract<EscrowEvent, { type: T }>> {
    return this.events.filter(
      (event): event is Extract<EscrowEvent, { type: T }> => event.type === type
    );
  }

  clear(): void {
    this.events.length = 0;
  }
}
