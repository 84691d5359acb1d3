// Optional pause before the monster acts. Outcome draws are already made when this runs.

import { Injectable, Logger } from '@nestjs/common';
import { setTimeout as sleep } from 'timers/promises';
import { BattleConfigService } from '../config/battle-config.service.js';
import type { AttackStyle, BattleSession } from '../types/index.js';

export interface MonsterIntent {
  style: AttackStyle;
  narration: string[];
}

export interface BattlePresenter {
  beforeMonsterAction(
    session: Readonly<BattleSession>,
    intent: MonsterIntent,
    signal?: AbortSignal,
  ): Promise<void>;
}

@Injectable()
export class DelayPresenter implements BattlePresenter {
  private readonly logger = new Logger(DelayPresenter.name);

  constructor(private readonly config: BattleConfigService) {}

  async beforeMonsterAction(
    session: Readonly<BattleSession>,
    _intent: MonsterIntent,
    signal?: AbortSignal,
  ): Promise<void> {
    const delayMs = this.config.get().monsterDelayMs;
    if (delayMs <= 0) return;
    if (signal?.aborted) {
      this.logger.debug(`Delay skipped for ${session.battleId}`);
      return;
    }
    try {
      await sleep(delayMs, undefined, { signal });
    } catch (err) {
      if (signal?.aborted) {
        this.logger.debug(`Delay cancelled for ${session.battleId}`);
        return;
      }
      throw err;
    }
  }
}
