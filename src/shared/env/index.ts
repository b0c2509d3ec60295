// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/env`
 * Purpose: Public entry for environment configuration.
 * Scope: Re-exports the validated server env accessor. Does not read process.env itself.
 * Invariants: Named exports only.
 * Side-effects: none
 * Links: src/shared/env/server.ts
 * @public
 */

export type { EnvValidationMeta, ServerEnv } from "./server";
export { EnvValidationError, resetServerEnv, serverEnv } from "./server";
