import { toSnapshot } from './battle-snapshot.js';
import { buildMonsterSnapshot, buildPlayerSnapshot } from './combatant.factory.js';
import { MonsterDefinitionSchema } from '../content/content.types.js';
import type { BattleSession } from '../types/index.js';

function session(): BattleSession {
  const player = buildPlayerSnapshot({ name: 'Hero', currentHP: 100, gold: 0, skills: [] }, {});
  player.statuses.push({ effectId: 'blessing', remainingDuration: 2, appliedBy: 'Prayer' });
  const monster = buildMonsterSnapshot(MonsterDefinitionSchema.parse({ name: 'Slime' }));
  monster.statuses.push({ effectId: 'burn', remainingDuration: 3, appliedBy: 'Fireball' });
  return {
    battleId: 'hero_1',
    actorId: 'hero',
    turn: 4,
    rngSeed: 9,
    status: 'active',
    winner: 'none',
    battleLog: ['l1', 'l2', 'l3', 'l4', 'l5', 'l6', 'l7', 'l8'],
    rewards: { xp: 0, gold: 0 },
    player,
    monster,
    startedAt: '2024-01-01T00:00:00.000Z',
    endedAt: null,
  };
}

describe('toSnapshot', () => {
  it('keeps only the log tail', () => {
    expect(toSnapshot(session(), 6).log).toEqual(['l3', 'l4', 'l5', 'l6', 'l7', 'l8']);
    expect(toSnapshot(session(), 0).log).toEqual([]);
  });

  it('summarises statuses by display name and turns left', () => {
    const snap = toSnapshot(session(), 6);
    expect(snap.player.statuses).toEqual(['Blessed (2)']);
    expect(snap.monster.statuses).toEqual(['Burning (3)']);
    expect(snap.monster).toMatchObject({ name: 'Slime', hp: 10, maxHP: 10, shield: 0 });
    expect(snap.turn).toBe(4);
  });

  it('does not share the rewards object', () => {
    const s = session();
    const snap = toSnapshot(s, 6);
    s.rewards.xp = 99;
    expect(snap.rewards.xp).toBe(0);
  });
});
