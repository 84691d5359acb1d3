import { StatusService } from './status.service.js';
import { STATUS_REGISTRY, toStatModifier } from './status-registry.js';
import type { BattleSession, CombatantSnapshot } from '../../types/index.js';

function makeCombatant(overrides: Partial<CombatantSnapshot> = {}): CombatantSnapshot {
  return {
    name: 'Tester',
    maxHP: 100,
    currentHP: 100,
    maxSP: 50,
    currentSP: 50,
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
    shield: 0,
    statuses: [],
    ...overrides,
  };
}

describe('status registry', () => {
  it('holds the eight catalogue effects', () => {
    expect([...STATUS_REGISTRY.keys()]).toEqual([
      'burn', 'poison', 'slow', 'shock', 'regeneration', 'blessing', 'shield_boost', 'weakness',
    ]);
  });

  it('tags sheet values by range', () => {
    expect(toStatModifier('attack', 0.2).op).toBe('PERCENT');
    expect(toStatModifier('attack', -0.3).op).toBe('PERCENT');
    expect(toStatModifier('accuracy', -10).op).toBe('PERCENT');
    expect(toStatModifier('accuracy', 15).op).toBe('FLAT');
    expect(toStatModifier('accuracy', 1).op).toBe('FLAT');
    expect(toStatModifier('accuracy', 0).op).toBe('FLAT');
  });

  it('compiles slow into tagged modifiers in sheet order', () => {
    expect(STATUS_REGISTRY.get('slow')?.statModifiers).toEqual([
      { stat: 'speed', op: 'PERCENT', value: -0.3, source: 'slow' },
      { stat: 'accuracy', op: 'PERCENT', value: -10, source: 'slow' },
    ]);
  });
});

describe('StatusService', () => {
  let service: StatusService;

  beforeEach(() => {
    service = new StatusService();
  });

  describe('applyStatus', () => {
    it('appends a new instance', () => {
      const target = makeCombatant();
      const applied = service.applyStatus(target, 'burn', 3, 'Fireball');
      expect(applied?.refreshed).toBe(false);
      expect(target.statuses).toEqual([
        { effectId: 'burn', remainingDuration: 3, appliedBy: 'Fireball' },
      ]);
    });

    it('refreshes instead of stacking, keeping the longer duration', () => {
      const target = makeCombatant();
      service.applyStatus(target, 'burn', 2, 'Fireball');
      service.applyStatus(target, 'burn', 4, 'Fireball');
      service.applyStatus(target, 'burn', 1, 'Fireball');
      expect(target.statuses).toHaveLength(1);
      expect(target.statuses[0].remainingDuration).toBe(4);
    });

    it('ignores unknown effects', () => {
      const target = makeCombatant();
      expect(service.applyStatus(target, 'petrify', 3, 'x')).toBeUndefined();
      expect(target.statuses).toEqual([]);
    });
  });

  describe('applyEffect', () => {
    it('buffs land on the caster', () => {
      const caster = makeCombatant({ name: 'Hero' });
      const opponent = makeCombatant({ name: 'Slime' });
      const applied = service.applyEffect(caster, opponent, 'blessing', 3, 'Prayer');
      expect(applied?.target).toBe(caster);
      expect(caster.statuses).toHaveLength(1);
      expect(opponent.statuses).toHaveLength(0);
    });

    it('debuffs land on the opponent', () => {
      const caster = makeCombatant({ name: 'Hero' });
      const opponent = makeCombatant({ name: 'Slime' });
      service.applyEffect(caster, opponent, 'weakness', 3, 'Curse');
      expect(opponent.statuses.map((s) => s.effectId)).toEqual(['weakness']);
      expect(caster.statuses).toHaveLength(0);
    });
  });

  describe('queries', () => {
    it('getModifiers follows application order', () => {
      const entity = makeCombatant({
        statuses: [
          { effectId: 'weakness', remainingDuration: 2, appliedBy: 'x' },
          { effectId: 'blessing', remainingDuration: 2, appliedBy: 'x' },
        ],
      });
      expect(service.getModifiers(entity.statuses).map((m) => [m.stat, m.value])).toEqual([
        ['attack', -0.3],
        ['attack', 0.2],
        ['accuracy', 15],
      ]);
    });

    it('isStunned only for stunning effects', () => {
      expect(service.isStunned([{ effectId: 'shock', remainingDuration: 1, appliedBy: 'x' }])).toBe(true);
      expect(service.isStunned([{ effectId: 'slow', remainingDuration: 1, appliedBy: 'x' }])).toBe(false);
    });

    it('hasDamageOverTime for burn and poison', () => {
      expect(service.hasDamageOverTime([{ effectId: 'poison', remainingDuration: 1, appliedBy: 'x' }])).toBe(true);
      expect(service.hasDamageOverTime([{ effectId: 'regeneration', remainingDuration: 1, appliedBy: 'x' }])).toBe(false);
    });
  });

  describe('tickCombatant', () => {
    it('burn 8 against shield 5 and 20 HP → shield 0, HP 17', () => {
      const entity = makeCombatant({
        shield: 5,
        currentHP: 20,
        statuses: [{ effectId: 'burn', remainingDuration: 3, appliedBy: 'x' }],
      });
      const lines = service.tickCombatant(entity);
      expect(entity.shield).toBe(0);
      expect(entity.currentHP).toBe(17);
      expect(entity.statuses[0].remainingDuration).toBe(2);
      expect(lines).toEqual(['Tester takes 8 damage from status effects (5 absorbed by shield)']);
    });

    it('sums DoT and HoT once per tick, not per status', () => {
      const entity = makeCombatant({
        currentHP: 50,
        statuses: [
          { effectId: 'burn', remainingDuration: 2, appliedBy: 'x' },
          { effectId: 'poison', remainingDuration: 2, appliedBy: 'x' },
          { effectId: 'regeneration', remainingDuration: 2, appliedBy: 'x' },
        ],
      });
      const lines = service.tickCombatant(entity);
      // 50 - 14 + 12
      expect(entity.currentHP).toBe(48);
      expect(lines).toEqual([
        'Tester takes 14 damage from status effects',
        'Tester regenerates 12 HP',
      ]);
    });

    it('drops expired statuses with a wore-off line, still applying their last tick', () => {
      const entity = makeCombatant({
        currentHP: 30,
        statuses: [{ effectId: 'poison', remainingDuration: 1, appliedBy: 'x' }],
      });
      const lines = service.tickCombatant(entity);
      expect(entity.statuses).toEqual([]);
      expect(entity.currentHP).toBe(24);
      expect(lines).toEqual([
        'Poisoned wore off Tester',
        'Tester takes 6 damage from status effects',
      ]);
    });

    it('HoT stops at maxHP and DoT at 0', () => {
      const healthy = makeCombatant({
        currentHP: 95,
        statuses: [{ effectId: 'regeneration', remainingDuration: 3, appliedBy: 'x' }],
      });
      service.tickCombatant(healthy);
      expect(healthy.currentHP).toBe(100);

      const dying = makeCombatant({
        currentHP: 3,
        statuses: [{ effectId: 'burn', remainingDuration: 3, appliedBy: 'x' }],
      });
      service.tickCombatant(dying);
      expect(dying.currentHP).toBe(0);
    });
  });

  describe('tickStatuses', () => {
    it('ticks player then monster and appends to the log', () => {
      const session: BattleSession = {
        battleId: 'u1_1',
        actorId: 'u1',
        turn: 1,
        rngSeed: 1,
        status: 'active',
        winner: 'none',
        battleLog: ['start'],
        rewards: { xp: 0, gold: 0 },
        player: {
          ...makeCombatant({
            name: 'Hero',
            statuses: [{ effectId: 'burn', remainingDuration: 2, appliedBy: 'x' }],
          }),
          skills: [],
          cooldowns: {},
        },
        monster: {
          ...makeCombatant({
            name: 'Slime',
            statuses: [{ effectId: 'poison', remainingDuration: 2, appliedBy: 'x' }],
          }),
          level: 1,
          xpReward: 10,
          goldReward: 5,
        },
        startedAt: '2024-01-01T00:00:00.000Z',
        endedAt: null,
      };
      const lines = service.tickStatuses(session);
      expect(lines).toEqual([
        'Hero takes 8 damage from status effects',
        'Slime takes 6 damage from status effects',
      ]);
      expect(session.battleLog).toEqual(['start', ...lines]);
    });
  });
});
