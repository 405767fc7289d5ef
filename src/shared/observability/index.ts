// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability`
 * Purpose: Barrel for logging and request context.
 * Scope: Re-exports only.
 * Side-effects: none
 * @public
 */

export * from "./context";
export * from "./logging";
