// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/assistant/services/session-lock`
 * Purpose: Per-session mutual exclusion so two requests for one session never interleave history writes.
 * Scope: In-process promise chaining keyed by session id. Does not coordinate across processes.
 * Invariants:
 *   - Work for one key runs strictly in arrival order
 *   - Different keys never wait on each other
 *   - A key's entry is removed once its last holder finishes
 * Side-effects: none
 * @internal
 */

export class SessionLock {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(sessionId: string, work: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(sessionId) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const held = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => held);
    this.tails.set(sessionId, tail);

    await previous;
    try {
      return await work();
    } finally {
      release();
      if (this.tails.get(sessionId) === tail) this.tails.delete(sessionId);
    }
  }

  isLocked(sessionId: string): boolean {
    return this.tails.has(sessionId);
  }
}
