import { Module } from '@nestjs/common';
import { EngineModule } from '../engine/engine.module.js';
import { RouterController } from './router.controller.js';
import { RouterSettingsController } from './router-settings.controller.js';
import { RouterService } from './router.service.js';

@Module({
  imports: [EngineModule],
  controllers: [RouterController, RouterSettingsController],
  providers: [RouterService],
})
export class RouterModule {}
