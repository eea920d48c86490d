// 라우터 설정 API — 런타임으로 override sentinel / seed 변경

import { Body, Controller, Get, Patch } from '@nestjs/common';
import { RouterConfigService } from '../config/router-config.service.js';
import { BadRequestError } from '../common/errors/router-errors.js';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe.js';
import {
  UpdateRouterSettingsBodySchema,
  type UpdateRouterSettingsBody,
} from './dto/update-settings.dto.js';

@Controller('v1/settings/router')
export class RouterSettingsController {
  constructor(private readonly configService: RouterConfigService) {}

  @Get()
  getSettings() {
    return this.configService.getPublic();
  }

  /** 다음 평가부터 반영 */
  @Patch()
  updateSettings(
    @Body(new ZodValidationPipe(UpdateRouterSettingsBodySchema))
    body: UpdateRouterSettingsBody,
  ) {
    if (body.overrideSentinels !== undefined) {
      if (body.overrideSentinels.length === 0) {
        throw new BadRequestError('overrideSentinels must not be empty');
      }
      if (body.overrideSentinels.some((s) => s.trim().length === 0)) {
        throw new BadRequestError('overrideSentinels must not contain blank values');
      }
    }

    this.configService.update(body);

    return {
      message: 'Router settings updated. Changes apply to the next evaluation.',
      ...this.configService.getPublic(),
    };
  }
}
