import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import { Request, Response } from 'express';
import { consumeFlashes, FlashMessage } from './flash.util';

export const Flashes = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): FlashMessage[] => {
    const http = ctx.switchToHttp();
    return consumeFlashes(http.getRequest<Request>(), http.getResponse<Response>());
  },
);
