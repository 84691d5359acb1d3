// Live battle sessions, keyed by battle id with an actor index

import { Injectable } from '@nestjs/common';
import type { BattleSession } from '../types/index.js';

@Injectable()
export class SessionRegistryService {
  private readonly sessions = new Map<string, BattleSession>();
  /** actorId → battleId of the actor's latest session */
  private readonly byActor = new Map<string, string>();
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Serializes tasks sharing a key. Callers use `battle:<id>` for actions
   * and `actor:<id>` for battle starts.
   */
  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let settle: () => void = () => undefined;
    const tail = new Promise<void>((resolve) => {
      settle = resolve;
    });
    this.tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      settle();
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }

  register(session: BattleSession): void {
    this.sessions.set(session.battleId, session);
    this.byActor.set(session.actorId, session.battleId);
  }

  get(battleId: string): BattleSession | undefined {
    return this.sessions.get(battleId);
  }

  has(battleId: string): boolean {
    return this.sessions.has(battleId);
  }

  findActiveByActor(actorId: string): BattleSession | undefined {
    const battleId = this.byActor.get(actorId);
    if (battleId === undefined) return undefined;
    const session = this.sessions.get(battleId);
    return session?.status === 'active' ? session : undefined;
  }

  isInBattle(actorId: string): boolean {
    return this.findActiveByActor(actorId) !== undefined;
  }

  /** Explicit removal; completed sessions otherwise stay readable. */
  cleanup(battleId: string): boolean {
    const session = this.sessions.get(battleId);
    if (!session) return false;
    this.sessions.delete(battleId);
    if (this.byActor.get(session.actorId) === battleId) {
      this.byActor.delete(session.actorId);
    }
    return true;
  }

  purgeCompleted(): number {
    let removed = 0;
    for (const session of [...this.sessions.values()]) {
      if (session.status === 'completed' && this.cleanup(session.battleId)) removed++;
    }
    return removed;
  }

  get size(): number {
    return this.sessions.size;
  }
}
