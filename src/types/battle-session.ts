import type { BattleStatus, Winner } from './enums.js';

export type StatusInstance = {
  effectId: string;
  remainingDuration: number;
  appliedBy: string;
};

export type CombatantStats = {
  maxHP: number;
  currentHP: number;
  maxSP: number;
  currentSP: number;
  attack: number;
  defense: number;
  speed: number;
  intelligence: number;
  luck: number;
  agility: number;
  accuracy: number;
  evasion: number;
  penetration: number;
  critBase: number;
  critDamageMultiplier: number;
};

export type CombatantSnapshot = CombatantStats & {
  name: string;
  shield: number;
  /** application order */
  statuses: StatusInstance[];
};

export type PlayerSnapshot = CombatantSnapshot & {
  skills: string[];
  cooldowns: Record<string, number>;
};

export type MonsterSnapshot = CombatantSnapshot & {
  level: number;
  xpReward: number;
  goldReward: number;
};

export type BattleRewards = {
  xp: number;
  gold: number;
};

export type BattleSession = {
  battleId: string;
  actorId: string;
  turn: number;
  rngSeed: number;
  status: BattleStatus;
  winner: Winner;
  battleLog: string[];
  rewards: BattleRewards;
  player: PlayerSnapshot;
  monster: MonsterSnapshot;
  startedAt: string;
  endedAt: string | null;
};
