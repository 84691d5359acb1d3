import { DelayPresenter } from './battle-presenter.js';
import { BattleConfigService } from '../config/battle-config.service.js';
import type { BattleSession } from '../types/index.js';

const intent = { style: 'normal' as const, narration: [] };

function fakeSession(): Readonly<BattleSession> {
  const stats = {
    maxHP: 1, currentHP: 1, maxSP: 0, currentSP: 0, attack: 1, defense: 0, speed: 1,
    intelligence: 1, luck: 1, agility: 1, accuracy: 1, evasion: 1, penetration: 0,
    critBase: 0, critDamageMultiplier: 1, shield: 0, statuses: [],
  };
  return {
    battleId: 'p_1', actorId: 'p', turn: 1, rngSeed: 1, status: 'active', winner: 'none',
    battleLog: [], rewards: { xp: 0, gold: 0 },
    player: { ...stats, name: 'P', skills: [], cooldowns: {} },
    monster: { ...stats, name: 'M', level: 1, xpReward: 0, goldReward: 0 },
    startedAt: '2024-01-01T00:00:00.000Z', endedAt: null,
  };
}

describe('DelayPresenter', () => {
  it('resolves at once with no delay configured', async () => {
    const config = new BattleConfigService();
    config.update({ monsterDelayMs: 0 });
    await expect(new DelayPresenter(config).beforeMonsterAction(fakeSession(), intent)).resolves.toBeUndefined();
  });

  it('skips the pause for an already aborted signal', async () => {
    const config = new BattleConfigService();
    config.update({ monsterDelayMs: 60_000 });
    const controller = new AbortController();
    controller.abort();
    await expect(
      new DelayPresenter(config).beforeMonsterAction(fakeSession(), intent, controller.signal),
    ).resolves.toBeUndefined();
  });

  it('cancelling mid-pause resolves instead of rejecting', async () => {
    const config = new BattleConfigService();
    config.update({ monsterDelayMs: 60_000 });
    const controller = new AbortController();
    const pending = new DelayPresenter(config).beforeMonsterAction(fakeSession(), intent, controller.signal);
    controller.abort();
    await expect(pending).resolves.toBeUndefined();
  });
});
