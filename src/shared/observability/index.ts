// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability`
 * Purpose: Cross-cutting observability - event registry and logging.
 * Scope: Unified entry point for observability utilities. Does not implement logic.
 * Invariants: No imports from bootstrap or ports.
 * Side-effects: none
 * Notes: Minimal public API - events registry + logEvent + logger factory.
 * Links: Delegates to events, logging and server submodules.
 * @public
 */

export type {
  EventBase,
  EventFields,
  EventName,
  SummaryEventName,
} from "./events";
export { EVENT_NAMES } from "./events";
export type { Logger } from "./logging";
export {
  formatLogFields,
  makeLogger,
  makeNoopLogger,
  REDACT_PATHS,
} from "./logging";
export { logEvent } from "./server/logEvent";
