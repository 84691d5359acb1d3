// Status engine: refresh-not-stack application, per-turn DoT/HoT ticking

import { Injectable } from '@nestjs/common';
import type {
  BattleSession,
  CombatantSnapshot,
  StatusInstance,
} from '../../types/index.js';
import type { StatModifier } from '../stats/stats.service.js';
import { STATUS_REGISTRY, type StatusEffectDefinition } from './status-registry.js';

export interface AppliedStatus {
  definition: StatusEffectDefinition;
  instance: StatusInstance;
  target: CombatantSnapshot;
  /** true when an existing instance had its duration refreshed */
  refreshed: boolean;
}

@Injectable()
export class StatusService {
  getDefinition(effectId: string): StatusEffectDefinition | undefined {
    return STATUS_REGISTRY.get(effectId);
  }

  /**
   * Existing instance → duration = max(old, new); otherwise appended.
   * Returns undefined for an unknown effect id.
   */
  applyStatus(
    target: CombatantSnapshot,
    effectId: string,
    duration: number,
    appliedBy: string,
  ): AppliedStatus | undefined {
    const definition = STATUS_REGISTRY.get(effectId);
    if (!definition) return undefined;

    const existing = target.statuses.find((s) => s.effectId === effectId);
    if (existing) {
      existing.remainingDuration = Math.max(existing.remainingDuration, duration);
      return { definition, instance: existing, target, refreshed: true };
    }

    const instance: StatusInstance = {
      effectId,
      remainingDuration: duration,
      appliedBy,
    };
    target.statuses.push(instance);
    return { definition, instance, target, refreshed: false };
  }

  /** Buffs land on the caster, debuffs on the opponent, whatever the caller intended. */
  applyEffect(
    caster: CombatantSnapshot,
    opponent: CombatantSnapshot,
    effectId: string,
    duration: number,
    appliedBy: string,
  ): AppliedStatus | undefined {
    const definition = STATUS_REGISTRY.get(effectId);
    if (!definition) return undefined;
    const target = definition.class === 'buff' ? caster : opponent;
    return this.applyStatus(target, effectId, duration, appliedBy);
  }

  /** Modifiers of every active status, in application order. */
  getModifiers(statuses: StatusInstance[]): StatModifier[] {
    const mods: StatModifier[] = [];
    for (const status of statuses) {
      const def = STATUS_REGISTRY.get(status.effectId);
      if (!def) continue;
      mods.push(...def.statModifiers);
    }
    return mods;
  }

  isStunned(statuses: StatusInstance[]): boolean {
    return statuses.some((s) => STATUS_REGISTRY.get(s.effectId)?.stuns === true);
  }

  hasDamageOverTime(statuses: StatusInstance[]): boolean {
    return statuses.some((s) => (STATUS_REGISTRY.get(s.effectId)?.dotAmount ?? 0) > 0);
  }

  /** End-of-player-turn tick: player first, then monster. Lines are appended to the log. */
  tickStatuses(session: BattleSession): string[] {
    const lines = [
      ...this.tickCombatant(session.player),
      ...this.tickCombatant(session.monster),
    ];
    session.battleLog.push(...lines);
    return lines;
  }

  tickCombatant(entity: CombatantSnapshot): string[] {
    const lines: string[] = [];
    const remaining: StatusInstance[] = [];
    let totalDot = 0;
    let totalHot = 0;

    for (const status of entity.statuses) {
      const def = STATUS_REGISTRY.get(status.effectId);
      totalDot += def?.dotAmount ?? 0;
      totalHot += def?.hotAmount ?? 0;

      status.remainingDuration = Math.max(0, status.remainingDuration - 1);
      if (status.remainingDuration > 0) {
        remaining.push(status);
      } else {
        lines.push(`${def?.displayName ?? status.effectId} wore off ${entity.name}`);
      }
    }
    entity.statuses = remaining;

    if (totalDot > 0) {
      const absorbed = Math.min(entity.shield, totalDot);
      entity.shield -= absorbed;
      entity.currentHP = Math.max(0, entity.currentHP - (totalDot - absorbed));
      lines.push(
        `${entity.name} takes ${totalDot} damage from status effects` +
          (absorbed > 0 ? ` (${absorbed} absorbed by shield)` : ''),
      );
    }

    if (totalHot > 0) {
      const before = entity.currentHP;
      entity.currentHP = Math.min(entity.maxHP, entity.currentHP + totalHot);
      const healed = entity.currentHP - before;
      if (healed > 0) {
        lines.push(`${entity.name} regenerates ${healed} HP`);
      }
    }

    return lines;
  }
}
