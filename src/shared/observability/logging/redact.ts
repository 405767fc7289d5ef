// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/logging/redact`
 * Purpose: Redaction paths for sensitive data in logs.
 * Scope: Define paths to redact from log output. Does not implement redaction logic.
 * Invariants: Only redact known secret-bearing keys.
 * Side-effects: none
 * Links: Imported by logger module.
 * @public
 */

export const REDACT_PATHS = [
  // Auth & secrets
  "password",
  "*.password",
  "token",
  "secret",
  "apiKey",
  "api_key",
  "*.apiKey",
  "azureOpenAIApiKey",
  "OPENAI_API_KEY",
  "AZURE_OPENAI_API_KEY",
  // HTTP headers
  "headers.authorization",
  "headers.cookie",
  "req.headers.authorization",
];
