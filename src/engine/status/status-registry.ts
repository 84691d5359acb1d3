// Status effect catalogue. Magnitudes are written the way balance sheets carry them
// and tagged PERCENT / FLAT once, when the registry is built.

import { COMBAT_STAT, type CombatStat, type StatusClass } from '../../types/index.js';
import type { StatModifier } from '../stats/stats.service.js';

export interface StatusEffectDefinition {
  id: string;
  displayName: string;
  description: string;
  class: StatusClass;
  statModifiers: StatModifier[];
  dotAmount: number;
  hotAmount: number;
  stuns: boolean;
}

type CatalogueEntry = {
  displayName: string;
  description: string;
  class: StatusClass;
  statModifiers?: Partial<Record<CombatStat, number>>;
  dot?: number;
  hot?: number;
  stuns?: boolean;
};

/**
 * Sheet value → tagged modifier:
 * v < 0 or 0 < v < 1 → PERCENT(v); anything else (0, 1, > 1) → FLAT(v).
 */
export function toStatModifier(stat: CombatStat, value: number, source?: string): StatModifier {
  const percent = value < 0 || (value > 0 && value < 1);
  return { stat, op: percent ? 'PERCENT' : 'FLAT', value, source };
}

const CATALOGUE: Record<string, CatalogueEntry> = {
  burn: {
    displayName: 'Burning',
    description: 'Takes fire damage over time',
    class: 'debuff',
    dot: 8,
  },
  poison: {
    displayName: 'Poisoned',
    description: 'Takes poison damage over time',
    class: 'debuff',
    dot: 6,
  },
  slow: {
    displayName: 'Slowed',
    description: 'Reduced speed and accuracy',
    class: 'debuff',
    statModifiers: { speed: -0.3, accuracy: -10 },
  },
  shock: {
    displayName: 'Shocked',
    description: 'Stunned and unable to act',
    class: 'debuff',
    stuns: true,
  },
  regeneration: {
    displayName: 'Regenerating',
    description: 'Slowly heals over time',
    class: 'buff',
    hot: 12,
  },
  blessing: {
    displayName: 'Blessed',
    description: 'Increased damage and accuracy',
    class: 'buff',
    statModifiers: { attack: 0.2, accuracy: 15 },
  },
  shield_boost: {
    displayName: 'Shielded',
    description: 'Increased defense',
    class: 'buff',
    statModifiers: { defense: 0.5 },
  },
  weakness: {
    displayName: 'Weakened',
    description: 'Reduced attack power',
    class: 'debuff',
    statModifiers: { attack: -0.3 },
  },
};

function compile(id: string, entry: CatalogueEntry): StatusEffectDefinition {
  const statModifiers: StatModifier[] = [];
  for (const [key, value] of Object.entries(entry.statModifiers ?? {})) {
    const stat = COMBAT_STAT.find((s) => s === key);
    if (stat !== undefined && value !== undefined) {
      statModifiers.push(toStatModifier(stat, value, id));
    }
  }
  return {
    id,
    displayName: entry.displayName,
    description: entry.description,
    class: entry.class,
    statModifiers,
    dotAmount: entry.dot ?? 0,
    hotAmount: entry.hot ?? 0,
    stuns: entry.stuns ?? false,
  };
}

export const STATUS_REGISTRY: ReadonlyMap<string, StatusEffectDefinition> = new Map(
  Object.entries(CATALOGUE).map(([id, entry]) => [id, compile(id, entry)]),
);
