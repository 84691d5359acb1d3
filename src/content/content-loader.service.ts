// Monster catalogue: JSON load at module init + in-memory cache

import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { readFile } from 'fs/promises';
import { join } from 'path';
import { BattleConfigService } from '../config/battle-config.service.js';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe.js';
import type { MonsterProvider } from '../battle/collaborators.js';
import { MonsterCatalogueSchema, type MonsterEntry } from './content.types.js';

@Injectable()
export class ContentLoaderService implements MonsterProvider, OnModuleInit {
  private readonly logger = new Logger(ContentLoaderService.name);
  private readonly catalogue = new ZodValidationPipe(MonsterCatalogueSchema, 'INVALID_MONSTER');
  private monsters = new Map<string, MonsterEntry>();

  constructor(private readonly config: BattleConfigService) {}

  async onModuleInit() {
    await this.loadAll();
  }

  async loadAll(): Promise<void> {
    const dir = this.config.get().contentDir;
    const raw = await readFile(join(dir, 'monsters.json'), 'utf-8');
    const entries = this.catalogue.transform(JSON.parse(raw));

    const monsters = new Map<string, MonsterEntry>();
    for (const m of entries) monsters.set(m.monsterId, m);
    this.monsters = monsters;

    this.logger.log(`Loaded ${monsters.size} monsters from ${dir}`);
  }

  getMonster(monsterId: string): MonsterEntry | undefined {
    return this.monsters.get(monsterId);
  }

  listMonsters(): MonsterEntry[] {
    return [...this.monsters.values()];
  }
}
