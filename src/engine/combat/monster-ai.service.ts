// Monster AI: attack style by battle-state heuristics, plus thinking narration

import { Injectable } from '@nestjs/common';
import type { AttackStyle, CombatantSnapshot } from '../../types/index.js';
import type { RandomSource } from '../rng/rng.service.js';
import { StatusService } from '../status/status.service.js';

export interface StyleModifier {
  /** attack power fed to physicalDamage (normal = 100) */
  power: number;
  /** accuracy = trunc(accuracy * accuracyFactor) */
  accuracyFactor: number;
}

export const STYLE_MODIFIERS: Record<AttackStyle, StyleModifier> = {
  normal: { power: 100, accuracyFactor: 1 },
  aggressive: { power: 130, accuracyFactor: 0.8 },
  defensive: { power: 70, accuracyFactor: 1.2 },
  desperate: { power: 150, accuracyFactor: 0.6 },
};

const STYLE_LINES: Record<AttackStyle, string | null> = {
  normal: null,
  aggressive: '{name} attacks aggressively!',
  defensive: '{name} attacks carefully!',
  desperate: '{name} attacks desperately!',
};

const THINKING = {
  critical: [
    '{name} looks desperate...',
    '{name} is breathing heavily...',
    '{name} snarls with rage!',
    '{name} prepares a desperate attack...',
  ],
  wounded: [
    '{name} assesses the situation...',
    '{name} circles cautiously...',
    '{name} plans its next move...',
    '{name} studies your stance...',
  ],
  healthy: [
    '{name} eyes you confidently...',
    '{name} flexes menacingly...',
    '{name} prepares to strike...',
    '{name} looks for an opening...',
  ],
  playerWeak: [
    '{name} senses your weakness...',
    '{name} moves in for the kill...',
    '{name} smells blood...',
  ],
  burning: [
    '{name} writhes in pain...',
    '{name} struggles against the effects...',
    '{name} fights through the agony...',
  ],
  slowed: [
    '{name} moves sluggishly...',
    '{name} shakes off the slowness...',
    '{name} struggles to focus...',
  ],
  opening: [
    '{name} sizes you up...',
    '{name} enters combat stance...',
    '{name} prepares for battle...',
  ],
  tired: [
    '{name} is getting tired...',
    '{name} breathes heavily...',
    '{name} pushes through fatigue...',
  ],
} as const;

const ACTION_PREP = [
  '{name} readies an attack!',
  '{name} lunges forward!',
  '{name} strikes!',
  '{name} attacks with fury!',
  '{name} unleashes its power!',
] as const;

function fill(template: string, name: string): string {
  return template.replace('{name}', name);
}

export function hpPercent(entity: Pick<CombatantSnapshot, 'currentHP' | 'maxHP'>): number {
  return (entity.currentHP / Math.max(1, entity.maxHP)) * 100;
}

@Injectable()
export class MonsterAiService {
  constructor(private readonly statusService: StatusService) {}

  /**
   * Rules in priority order; a rule whose draw fails falls through to the next.
   * Each entered rule costs one draw.
   */
  chooseAttackStyle(
    monster: CombatantSnapshot,
    player: CombatantSnapshot,
    rng: RandomSource,
  ): AttackStyle {
    const monsterPct = hpPercent(monster);
    const playerPct = hpPercent(player);

    if (monsterPct < 20 && rng.next() < 0.7) return 'desperate';
    if (playerPct < 30 && rng.next() < 0.6) return 'aggressive';
    if (monsterPct > 20 && monsterPct < 50 && rng.next() < 0.4) return 'defensive';
    if (this.statusService.hasDamageOverTime(monster.statuses) && rng.next() < 0.5) {
      return 'aggressive';
    }

    const roll = rng.next();
    if (roll < 0.15) return 'aggressive';
    if (roll < 0.25) return 'defensive';
    return 'normal';
  }

  styleModifier(style: AttackStyle, accuracy: number): { power: number; accuracy: number } {
    const mod = STYLE_MODIFIERS[style];
    return { power: mod.power, accuracy: Math.trunc(accuracy * mod.accuracyFactor) };
  }

  styleLine(style: AttackStyle, monsterName: string): string | null {
    const template = STYLE_LINES[style];
    return template === null ? null : fill(template, monsterName);
  }

  /** One thinking line and one action line, both drawn from the narration stream. */
  narrate(
    monster: CombatantSnapshot,
    player: CombatantSnapshot,
    turn: number,
    rng: RandomSource,
  ): string[] {
    const pool: string[] = [];
    const monsterPct = hpPercent(monster);

    if (monsterPct < 25) pool.push(...THINKING.critical);
    else if (monsterPct < 50) pool.push(...THINKING.wounded);
    else pool.push(...THINKING.healthy);

    if (hpPercent(player) < 30) pool.push(...THINKING.playerWeak);
    if (this.statusService.hasDamageOverTime(monster.statuses)) pool.push(...THINKING.burning);
    if (monster.statuses.some((s) => s.effectId === 'slow')) pool.push(...THINKING.slowed);

    if (turn === 1) pool.push(...THINKING.opening);
    else if (turn > 8) pool.push(...THINKING.tired);

    const lines: string[] = [];
    const thought = rng.pick(pool);
    if (thought !== undefined) lines.push(fill(thought, monster.name));
    const prep = rng.pick(ACTION_PREP);
    if (prep !== undefined) lines.push(fill(prep, monster.name));
    return lines;
  }
}
