import { CompanySession } from '../models/session';
import { UnauthenticatedException } from '../exceptions/auth.exceptions';
import { SessionGuard } from './session.guard';

describe('SessionGuard', () => {
  const guard = new SessionGuard();
  const company: CompanySession = { accountId: 'acc-1', companyName: 'Acme', storeLocation: '/tmp/company_acc-1.db' };

  it('passes the validated company through', () => {
    expect(guard.handleRequest(null, company, undefined)).toBe(company);
  });

  it('redirects to the login page when there is no session', () => {
    expect(() => guard.handleRequest(null, false, new Error('No auth token'))).toThrow(UnauthenticatedException);

    try {
      guard.handleRequest(new Error('jwt malformed'), false, undefined);
    } catch (error) {
      expect(error).toBeInstanceOf(UnauthenticatedException);
      expect(error).toMatchObject({ category: 'warning', redirectTo: '/login' });
    }
    expect.assertions(3);
  });
});
