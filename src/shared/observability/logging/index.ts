// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/logging`
 * Purpose: Barrel for the pino logger factory, redaction paths and event shapes.
 * Scope: Re-exports only.
 * Side-effects: none
 * @public
 */

export * from "./events";
export { type Logger, makeLogger, makeNoopLogger } from "./logger";
export { REDACT_PATHS } from "./redact";
