// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/session/in-memory-session-store`
 * Purpose: Process-local session store for conversation histories.
 * Scope: Map-backed SessionStorePort. Histories are lost on restart; replace with a durable adapter behind the same port.
 * Invariants:
 *   - put() rejects histories that break tool-call pairing, leaving the stored history untouched
 *   - Stored and returned histories are deep copies
 * Side-effects: none (in-memory state owned by the instance)
 * Links: Implements SessionStorePort
 * @internal
 */

import {
  findToolPairingViolation,
  type Message,
} from "@prodassist/ai-core";

import { SessionHistoryError, type SessionStorePort } from "@/ports";

export class InMemorySessionStoreAdapter implements SessionStorePort {
  private readonly sessions = new Map<string, readonly Message[]>();

  async get(sessionId: string): Promise<readonly Message[]> {
    const history = this.sessions.get(sessionId);
    return history ? structuredClone(history) : [];
  }

  async put(sessionId: string, history: readonly Message[]): Promise<void> {
    const violation = findToolPairingViolation(history);
    if (violation !== null) {
      throw new SessionHistoryError(sessionId, violation);
    }
    this.sessions.set(sessionId, structuredClone(history));
  }

  async delete(sessionId: string): Promise<boolean> {
    return this.sessions.delete(sessionId);
  }

  /** Number of live sessions. */
  get size(): number {
    return this.sessions.size;
  }
}
