/* eslint-disable prettier/prettier */
import { Injectable, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PassportStrategy } from '@nestjs/passport';
import { ExtractJwt, Strategy } from 'passport-jwt';
import { CompanySession, SESSION_COOKIE, SessionPayload } from './models/session';

export function sessionCookieExtractor(req: { cookies?: Record<string, unknown> }): string | null {
  const token: unknown = req.cookies?.[SESSION_COOKIE];
  return typeof token === 'string' && token !== '' ? token : null;
}

@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy) {
  constructor(configService: ConfigService) {
    const sessionSecret = configService.get<string>('sessionSecret');
    if (!sessionSecret) {
      throw new Error('SESSION_SECRET is not configured in environment variables');
    }
    super({
      jwtFromRequest: ExtractJwt.fromExtractors([sessionCookieExtractor]),
      secretOrKey: sessionSecret,
      ignoreExpiration: false,
    });
  }

  validate(payload: SessionPayload): CompanySession {
    const { sub, companyName, storeLocation } = payload;
    if (!sub || !companyName || !storeLocation) {
      throw new UnauthorizedException('Invalid session payload');
    }
    return { accountId: sub, companyName, storeLocation };
  }
}
