import { Injectable, Logger } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import { UnauthenticatedException } from '../exceptions/auth.exceptions';
import { CompanySession } from '../models/session';

/**
 * Rejects requests without a valid session cookie. The rejection is a flash
 * notice plus a redirect to /login, never a bare 401.
 */
@Injectable()
export class SessionGuard extends AuthGuard('jwt') {
  private readonly logger = new Logger(SessionGuard.name);

  handleRequest<TUser = CompanySession>(err: unknown, user: TUser | false, info: unknown): TUser {
    if (err || !user) {
      const reason = err instanceof Error ? err.message : info instanceof Error ? info.message : 'no session';
      this.logger.debug(`Session rejected: ${reason}`);
      throw new UnauthenticatedException();
    }
    return user;
  }
}
