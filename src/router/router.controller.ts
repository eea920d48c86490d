import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe.js';
import { RouterService } from './router.service.js';
import {
  DispatchBodySchema,
  RouterLayoutBodySchema,
  type DispatchBody,
  type RouterLayoutBody,
} from './dto/dispatch.dto.js';

@Controller('v1/router')
export class RouterController {
  constructor(private readonly routerService: RouterService) {}

  /** 라우터 노드의 출력 슬롯 목록 (에디터에서 라우트 행 변경 시) */
  @Post('outputs')
  @HttpCode(HttpStatus.OK)
  outputs(
    @Body(new ZodValidationPipe(RouterLayoutBodySchema)) body: RouterLayoutBody,
  ) {
    return this.routerService.layout(body);
  }

  @Post('dispatch')
  @HttpCode(HttpStatus.OK)
  dispatch(@Body(new ZodValidationPipe(DispatchBodySchema)) body: DispatchBody) {
    return this.routerService.dispatch(body);
  }
}
