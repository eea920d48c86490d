import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { ConfigModule } from './config/config.module.js';
import { RouterExceptionFilter } from './common/filters/router-exception.filter.js';
import { EngineModule } from './engine/engine.module.js';
import { RouterModule } from './router/router.module.js';

@Module({
  imports: [ConfigModule, EngineModule, RouterModule],
  providers: [
    {
      provide: APP_FILTER,
      useClass: RouterExceptionFilter,
    },
  ],
})
export class AppModule {}
