// Read-only view handed to the presentation layer

import { STATUS_REGISTRY } from '../engine/status/status-registry.js';
import type {
  BattleRewards,
  BattleSession,
  BattleStatus,
  CombatantSnapshot,
  Winner,
} from '../types/index.js';

export interface CombatantView {
  name: string;
  hp: number;
  maxHP: number;
  sp: number;
  maxSP: number;
  shield: number;
  attack: number;
  defense: number;
  accuracy: number;
  evasion: number;
  /** e.g. "Burning (2)" */
  statuses: string[];
}

export interface BattleSnapshot {
  battleId: string;
  actorId: string;
  turn: number;
  status: BattleStatus;
  winner: Winner;
  rewards: BattleRewards;
  log: string[];
  player: CombatantView;
  monster: CombatantView;
}

function view(entity: CombatantSnapshot): CombatantView {
  return {
    name: entity.name,
    hp: entity.currentHP,
    maxHP: entity.maxHP,
    sp: entity.currentSP,
    maxSP: entity.maxSP,
    shield: entity.shield,
    attack: entity.attack,
    defense: entity.defense,
    accuracy: entity.accuracy,
    evasion: entity.evasion,
    statuses: entity.statuses.map(
      (s) => `${STATUS_REGISTRY.get(s.effectId)?.displayName ?? s.effectId} (${s.remainingDuration})`,
    ),
  };
}

export function toSnapshot(session: BattleSession, tail: number): BattleSnapshot {
  return {
    battleId: session.battleId,
    actorId: session.actorId,
    turn: session.turn,
    status: session.status,
    winner: session.winner,
    rewards: { ...session.rewards },
    log: tail > 0 ? session.battleLog.slice(-tail) : [],
    player: view(session.player),
    monster: view(session.monster),
  };
}
