import { Module } from '@nestjs/common';
import { RngService } from './rng/rng.service.js';
import { RouteTableService } from './routing/route-table.service.js';
import { SamplerService } from './routing/sampler.service.js';
import { DispatchEngineService } from './routing/dispatch-engine.service.js';

const providers = [
  // Layer 1
  RngService,
  RouteTableService,
  // Layer 2
  SamplerService,
  // Layer 3
  DispatchEngineService,
];

@Module({
  providers,
  exports: providers,
})
export class EngineModule {}
