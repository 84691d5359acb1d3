// Battle tuning: .env defaults plus runtime overrides

import { Injectable, Logger } from '@nestjs/common';
import { join } from 'path';

export interface BattleConfig {
  attackSpRegen: number;
  defendSpRegen: number;
  fleeChance: number;
  ultimateSpCost: number;
  statusDuration: number;
  logTail: number;
  monsterDelayMs: number;
  contentDir: string;
}

export type BattleConfigPatch = Partial<Omit<BattleConfig, 'contentDir'>>;

const DEFAULT_CONTENT_DIR = join(__dirname, '..', '..', 'content');

@Injectable()
export class BattleConfigService {
  private readonly logger = new Logger(BattleConfigService.name);
  private config: BattleConfig;

  constructor() {
    this.config = {
      attackSpRegen: parseInt(process.env.BATTLE_ATTACK_SP_REGEN ?? '20', 10),
      defendSpRegen: parseInt(process.env.BATTLE_DEFEND_SP_REGEN ?? '15', 10),
      fleeChance: parseFloat(process.env.BATTLE_FLEE_CHANCE ?? '0.7'),
      ultimateSpCost: parseInt(process.env.BATTLE_ULTIMATE_SP_COST ?? '100', 10),
      statusDuration: parseInt(process.env.BATTLE_STATUS_DURATION ?? '3', 10),
      logTail: parseInt(process.env.BATTLE_LOG_TAIL ?? '6', 10),
      monsterDelayMs: parseInt(process.env.BATTLE_MONSTER_DELAY_MS ?? '0', 10),
      contentDir: process.env.BATTLE_CONTENT_DIR ?? DEFAULT_CONTENT_DIR,
    };
  }

  get(): BattleConfig {
    return this.config;
  }

  /** Applies from the next action onward; sessions already in flight are not touched. */
  update(patch: BattleConfigPatch): BattleConfig {
    this.config = { ...this.config, ...patch };
    this.logger.log(`Battle config updated: ${JSON.stringify(patch)}`);
    return this.config;
  }
}
