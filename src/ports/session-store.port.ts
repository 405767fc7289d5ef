// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/session-store.port`
 * Purpose: Port interface for conversation history storage keyed by session id.
 * Scope: Defines SessionStorePort and SessionHistoryError. Does not contain implementations.
 * Invariants:
 *   - get() returns an empty history for unknown sessions, never null
 *   - put() replaces the whole history and rejects one that breaks tool-call pairing
 *   - Returned histories are copies; mutating them never changes the store
 * Side-effects: none
 * @public
 */

import type { Message } from "@prodassist/ai-core";

/** Thrown when put() receives a history with unanswered or orphaned tool calls. */
export class SessionHistoryError extends Error {
  constructor(sessionId: string, detail: string) {
    super(`Refusing to store session ${sessionId}: ${detail}`);
    this.name = "SessionHistoryError";
  }
}

export interface SessionStorePort {
  get(sessionId: string): Promise<readonly Message[]>;
  put(sessionId: string, history: readonly Message[]): Promise<void>;
  /** @returns false when the session did not exist */
  delete(sessionId: string): Promise<boolean>;
}
