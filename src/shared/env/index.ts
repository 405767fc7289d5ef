// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/env`
 * Purpose: Barrel for environment access.
 * Scope: Re-exports only.
 * Side-effects: none
 * @public
 */

export {
  EnvValidationError,
  type EnvValidationMeta,
  resetServerEnv,
  type ServerEnv,
  serverEnv,
} from "./server";
