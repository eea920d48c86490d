import { Global, Module } from '@nestjs/common';
import { RouterConfigService } from './router-config.service.js';

@Global()
@Module({
  providers: [
    {
      provide: RouterConfigService,
      useFactory: () => new RouterConfigService(process.env),
    },
  ],
  exports: [RouterConfigService],
})
export class ConfigModule {}
