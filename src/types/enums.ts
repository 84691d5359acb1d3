// Canonical enums

export const BATTLE_STATUS = ['active', 'completed'] as const;
export type BattleStatus = (typeof BATTLE_STATUS)[number];

export const WINNER = ['none', 'player', 'monster', 'fled'] as const;
export type Winner = (typeof WINNER)[number];

export const BATTLE_ACTION = [
  'attack',
  'defend',
  'flee',
  'skill',
  'item',
  'ultimate',
] as const;
export type BattleActionType = (typeof BATTLE_ACTION)[number];

export const ATTACK_STYLE = [
  'normal',
  'aggressive',
  'defensive',
  'desperate',
] as const;
export type AttackStyle = (typeof ATTACK_STYLE)[number];

export const STATUS_CLASS = ['buff', 'debuff'] as const;
export type StatusClass = (typeof STATUS_CLASS)[number];

export const HIT_OUTCOME = ['hit', 'graze', 'miss'] as const;
export type HitOutcome = (typeof HIT_OUTCOME)[number];

/** Stats that statuses and item boosts can modify. */
export const COMBAT_STAT = [
  'attack',
  'defense',
  'speed',
  'accuracy',
  'evasion',
] as const;
export type CombatStat = (typeof COMBAT_STAT)[number];

export const SKILL_TYPE = ['physical', 'magic'] as const;
export type SkillType = (typeof SKILL_TYPE)[number];
