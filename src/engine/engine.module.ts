import { Module } from '@nestjs/common';
import { RngService } from './rng/rng.service.js';
import { StatsService } from './stats/stats.service.js';
import { StatusService } from './status/status.service.js';
import { HitService } from './combat/hit.service.js';
import { DamageService } from './combat/damage.service.js';
import { MonsterAiService } from './combat/monster-ai.service.js';

const providers = [
  // Layer 1: randomness
  RngService,
  // Layer 2: stat folding
  StatsService,
  // Layer 3: statuses
  StatusService,
  // Layer 4: combat math and AI
  HitService,
  DamageService,
  MonsterAiService,
];

@Module({
  providers,
  exports: providers,
})
export class EngineModule {}
