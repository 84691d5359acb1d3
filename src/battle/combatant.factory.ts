// Battle-scoped snapshots built from collaborator data

import type { MonsterDefinition } from '../content/content.types.js';
import type { MonsterSnapshot, PlayerSnapshot } from '../types/index.js';
import type { CharacterRecord, DerivedStats } from './collaborators.js';

export const PLAYER_DEFAULTS = {
  maxHP: 100,
  maxSP: 50,
  attack: 10,
  defense: 5,
  speed: 5,
  intelligence: 5,
  luck: 5,
  agility: 5,
  accuracy: 60,
  evasion: 20,
  penetration: 0,
  critBase: 0.05,
  critDamageMultiplier: 1.5,
} as const;

const MONSTER_CRIT_BASE = 0.05;
const MONSTER_CRIT_MULTIPLIER = 1.5;

/** Starts at full HP; companion attack/defense points are added on top of derived stats. */
export function buildPlayerSnapshot(
  character: CharacterRecord,
  derived: DerivedStats,
): PlayerSnapshot {
  const stats = { ...PLAYER_DEFAULTS, ...definedOnly(derived) };
  const companion = character.companionSkills ?? {};
  const maxHP = Math.max(1, stats.maxHP);
  const maxSP = Math.max(0, stats.maxSP);

  return {
    name: character.name,
    maxHP,
    currentHP: maxHP,
    maxSP,
    currentSP: Math.min(maxSP, Math.max(0, derived.currentSP ?? maxSP)),
    attack: stats.attack + Math.trunc(companion.attack ?? 0),
    defense: stats.defense + Math.trunc(companion.defense ?? 0),
    speed: stats.speed,
    intelligence: stats.intelligence,
    luck: stats.luck,
    agility: stats.agility,
    accuracy: stats.accuracy,
    evasion: stats.evasion,
    penetration: stats.penetration,
    critBase: stats.critBase,
    critDamageMultiplier: stats.critDamageMultiplier,
    shield: 0,
    statuses: [],
    skills: [...character.skills],
    cooldowns: {},
  };
}

/** Monsters carry no SP; their crit luck is their level. */
export function buildMonsterSnapshot(def: MonsterDefinition): MonsterSnapshot {
  return {
    name: def.name,
    maxHP: def.hp,
    currentHP: def.hp,
    maxSP: 0,
    currentSP: 0,
    attack: def.attack,
    defense: def.defense,
    speed: 5,
    intelligence: 5,
    luck: def.level,
    agility: 5,
    accuracy: def.accuracy,
    evasion: def.evasion,
    penetration: 0,
    critBase: MONSTER_CRIT_BASE,
    critDamageMultiplier: MONSTER_CRIT_MULTIPLIER,
    shield: 0,
    statuses: [],
    level: def.level,
    xpReward: def.xpReward,
    goldReward: def.goldReward,
  };
}

function definedOnly(stats: DerivedStats): DerivedStats {
  const out: DerivedStats = {};
  for (const [key, value] of Object.entries(stats)) {
    if (value !== undefined) Object.assign(out, { [key]: value });
  }
  return out;
}
