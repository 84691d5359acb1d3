import { DynamicModule, Module, type Provider, type Type } from '@nestjs/common';
import { BattleConfigModule } from '../config/battle-config.module.js';
import { ContentModule } from '../content/content.module.js';
import { EngineModule } from '../engine/engine.module.js';
import { BattleErrorFilter } from '../common/filters/battle-error.filter.js';
import { BattleService } from './battle.service.js';
import { DelayPresenter, type BattlePresenter } from './battle-presenter.js';
import { SessionRegistryService } from './session-registry.service.js';
import {
  BATTLE_PRESENTER,
  CHARACTER_STORE,
  INVENTORY_STORE,
  type CharacterStore,
  type InventoryStore,
} from './collaborators.js';

/** Instances, or classes Nest should construct. */
export interface BattleModuleOptions {
  characterStore: CharacterStore | Type<CharacterStore>;
  inventoryStore: InventoryStore | Type<InventoryStore>;
  presenter?: BattlePresenter | Type<BattlePresenter>;
}

function isClass<T>(impl: T | Type<T>): impl is Type<T> {
  return typeof impl === 'function';
}

function bind<T>(token: symbol, impl: T | Type<T>): Provider {
  return isClass(impl) ? { provide: token, useClass: impl } : { provide: token, useValue: impl };
}

@Module({})
export class BattleModule {
  static forRoot(options: BattleModuleOptions): DynamicModule {
    return {
      module: BattleModule,
      imports: [BattleConfigModule, EngineModule, ContentModule],
      providers: [
        SessionRegistryService,
        BattleErrorFilter,
        DelayPresenter,
        bind(CHARACTER_STORE, options.characterStore),
        bind(INVENTORY_STORE, options.inventoryStore),
        options.presenter
          ? bind(BATTLE_PRESENTER, options.presenter)
          : { provide: BATTLE_PRESENTER, useExisting: DelayPresenter },
        BattleService,
      ],
      exports: [BattleService, SessionRegistryService, ContentModule],
    };
  }
}
