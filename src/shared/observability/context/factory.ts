// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/context/factory`
 * Purpose: Factory for creating request-scoped context with a sanitized reqId.
 * Scope: Create RequestContext with child logger; sanitize caller-supplied request ids. Does not manage context lifecycle.
 * Invariants: reqId is validated (max 64 chars, alphanumeric + _-); otherwise a fresh UUID.
 * Side-effects: randomness
 * @public
 */

import { randomUUID } from "node:crypto";

import type { Logger } from "pino";

import type { RequestContext } from "./types";

const MAX_REQ_ID_LENGTH = 64;
const REQ_ID_PATTERN = /^[a-zA-Z0-9_-]+$/;

/**
 * Sanitize an incoming request id to prevent log injection.
 * Max 64 chars, alphanumeric + _- only.
 */
export function sanitizeReqId(incoming: string | undefined): string {
  if (
    incoming &&
    incoming.length <= MAX_REQ_ID_LENGTH &&
    REQ_ID_PATTERN.test(incoming)
  ) {
    return incoming;
  }
  return randomUUID();
}

export function createRequestContext(
  deps: { baseLog: Logger },
  meta: { sessionId: string; reqId?: string | undefined }
): RequestContext {
  const reqId = sanitizeReqId(meta.reqId);
  return {
    log: deps.baseLog.child({ reqId, sessionId: meta.sessionId }),
    reqId,
    sessionId: meta.sessionId,
  };
}
