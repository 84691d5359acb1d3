import { Global, Module } from '@nestjs/common';
import { BattleConfigService } from './battle-config.service.js';

@Global()
@Module({
  providers: [BattleConfigService],
  exports: [BattleConfigService],
})
export class BattleConfigModule {}
