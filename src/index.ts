import 'reflect-metadata';

export * from './types/index.js';
export * from './common/errors/battle-errors.js';
export type { ActionFailure } from './common/filters/battle-error.filter.js';
export { BattleConfigService } from './config/battle-config.service.js';
export type { BattleConfig, BattleConfigPatch } from './config/battle-config.service.js';
export { MonsterDefinitionSchema } from './content/content.types.js';
export type { MonsterDefinition, MonsterDefinitionInput, MonsterEntry } from './content/content.types.js';
export { ContentLoaderService } from './content/content-loader.service.js';
export { ContentModule } from './content/content.module.js';
export { EngineModule } from './engine/engine.module.js';
export { RngService, Rng, STREAM_OFFSET } from './engine/rng/rng.service.js';
export { HitService } from './engine/combat/hit.service.js';
export { DamageService } from './engine/combat/damage.service.js';
export { MonsterAiService, STYLE_MODIFIERS } from './engine/combat/monster-ai.service.js';
export { StatsService } from './engine/stats/stats.service.js';
export { StatusService } from './engine/status/status.service.js';
export { STATUS_REGISTRY, toStatModifier } from './engine/status/status-registry.js';
export { BattleModule } from './battle/battle.module.js';
export type { BattleModuleOptions } from './battle/battle.module.js';
export { BattleService } from './battle/battle.service.js';
export type { ActionOptions, ActionOutcome, ActionSuccess, StartOptions } from './battle/battle.service.js';
export { SessionRegistryService } from './battle/session-registry.service.js';
export { DelayPresenter } from './battle/battle-presenter.js';
export type { BattlePresenter, MonsterIntent } from './battle/battle-presenter.js';
export type { BattleSnapshot, CombatantView } from './battle/battle-snapshot.js';
export { BattleActionSchema } from './battle/dto/battle-action.dto.js';
export type { BattleAction } from './battle/dto/battle-action.dto.js';
export * from './battle/collaborators.js';
