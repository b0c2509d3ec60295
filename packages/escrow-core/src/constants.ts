// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@vote-escrow/escrow-core/constants`
 * Purpose: Fixed time and iteration constants for the vote-escrow engine.
 * Scope: Constants only. Does not contain logic.
 * Invariants: All time values are seconds as bigint (ALL_MATH_BIGINT).
 * Side-effects: none
 * Links: docs/VOTING_ESCROW.md
 * @public
 */

/** Lock expiries and the global walk are aligned to whole weeks */
export const WEEK = 7n * 86_400n;

/** Longest lock, 4 years */
export const MAXTIME = 4n * 365n * 86_400n;

/** Fixed-point scale for the block-per-second estimate */
export const MULTIPLIER = 10n ** 18n;

/**
 * Week steps the global walk takes per call. Callers idle for longer than this
 * must pump `checkpoint()` repeatedly to catch up.
 */
export const MAX_WALK_STEPS = 255;

/** Enough halvings for any 128-bit epoch range */
export const MAX_SEARCH_ITERATIONS = 128;

export const ZERO_ADDRESS = "0x0000000000000000000000000000000000000000" as const;
