import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import { Request } from 'express';
import { UnauthenticatedException } from '../exceptions/auth.exceptions';
import { CompanySession } from '../models/session';

export const CurrentCompany = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): CompanySession => {
    const { user } = ctx.switchToHttp().getRequest<Request>();
    if (!user) {
      throw new UnauthenticatedException();
    }
    return user;
  },
);
