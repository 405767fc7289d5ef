// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/context`
 * Purpose: Barrel for request context.
 * Scope: Re-exports only.
 * Side-effects: none
 * @public
 */

export { createRequestContext, sanitizeReqId } from "./factory";
export type { RequestContext } from "./types";
