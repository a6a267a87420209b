/* eslint-disable prettier/prettier */
export const SESSION_COOKIE = 'session';

/** Claims signed into the session cookie. */
export interface SessionPayload {
  sub: string;
  companyName: string;
  storeLocation: string;
}

/**
 * Request-scoped identity of the acting company. Handlers receive it through
 * @CurrentCompany() and pass it to every store operation.
 */
export interface CompanySession {
  accountId: string;
  companyName: string;
  storeLocation: string;
}

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    // eslint-disable-next-line @typescript-eslint/no-empty-interface
    interface User extends CompanySession {}
  }
}
