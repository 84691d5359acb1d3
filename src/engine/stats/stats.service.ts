// Effective combat stats: base values folded with status modifiers in application order

import { Injectable } from '@nestjs/common';
import { COMBAT_STAT, type CombatStat } from '../../types/index.js';

export type ModifierOp = 'FLAT' | 'PERCENT';

export interface StatModifier {
  stat: CombatStat;
  op: ModifierOp;
  value: number;
  source?: string;
}

export type EffectiveStats = Record<CombatStat, number>;

export interface ResolvedStats {
  stats: EffectiveStats;
  /** narration only, e.g. "+10 attack" */
  deltas: string[];
}

/** PERCENT scales the running value (truncated), FLAT adds the truncated delta. */
export function applyModifier(current: number, mod: Pick<StatModifier, 'op' | 'value'>): number {
  if (mod.op === 'PERCENT') {
    return Math.trunc(current * (1 + mod.value));
  }
  return current + Math.trunc(mod.value);
}

@Injectable()
export class StatsService {
  effectiveStats(
    base: Pick<Record<CombatStat, number>, CombatStat>,
    modifiers: StatModifier[],
  ): ResolvedStats {
    const stats: EffectiveStats = {
      attack: base.attack,
      defense: base.defense,
      speed: base.speed,
      accuracy: base.accuracy,
      evasion: base.evasion,
    };

    // not commutative: PERCENT then FLAT differs from FLAT then PERCENT
    for (const mod of modifiers) {
      stats[mod.stat] = applyModifier(stats[mod.stat], mod);
    }

    const deltas: string[] = [];
    for (const stat of COMBAT_STAT) {
      const diff = stats[stat] - base[stat];
      if (diff > 0) deltas.push(`+${diff} ${stat}`);
      else if (diff < 0) deltas.push(`${diff} ${stat}`);
    }

    return { stats, deltas };
  }
}
