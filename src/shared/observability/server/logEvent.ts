// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/server/logEvent`
 * Purpose: Typed logger for escrow operation summaries, one line per committed operation.
 * Scope: Single function for logging structured events. Does not create loggers.
 * Invariants: opId MUST be present (throws under Vitest, logs error elsewhere); fields MUST match the EventFields entry for the event name.
 * Side-effects: IO (logging)
 * Notes: bigint fields must be stringified by the caller.
 * Links: Uses EVENT_NAMES registry from events/index.ts; called by features and adapters.
 * @public
 */

import type { Logger } from "pino";
import type { EventBase, EventFields, SummaryEventName } from "../events";

/**
 * Log an operation summary. The payload type follows the event name.
 *
 * @param message - Human-readable message (defaults to event name)
 */
export function logEvent<E extends SummaryEventName>(
  logger: Logger,
  eventName: E,
  fields: EventBase & EventFields[E],
  message?: string
): void {
  if (!fields.opId) {
    const isStrict =
      // biome-ignore lint/style/noProcessEnv: Runtime test detection for strict validation
      typeof process !== "undefined" && process.env.VITEST === "true";

    if (isStrict) {
      throw new Error(
        `INVARIANT VIOLATION: logEvent("${eventName}") called without opId`
      );
    }
    logger.error(
      { event: eventName, missingField: "opId" },
      "inv_missing_opId_in_logEvent"
    );
    return;
  }

  logger.info({ event: eventName, ...fields }, message ?? eventName);
}
