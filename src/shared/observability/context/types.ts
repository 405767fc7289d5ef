// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/context/types`
 * Purpose: Request-scoped context type for passing the logger and ids through layers.
 * Scope: Define RequestContext interface. Does not implement context creation.
 * Invariants: log is a child logger with reqId and sessionId bound.
 * Side-effects: none
 * @public
 */

import type { Logger } from "pino";

export interface RequestContext {
  log: Logger; // Child logger with reqId, sessionId
  reqId: string; // Request correlation ID
  sessionId: string;
}
