import { CookieOptions } from 'express';

export type FlashCategory = 'success' | 'info' | 'warning' | 'danger';

export interface FlashMessage {
  category: FlashCategory;
  message: string;
}

export const FLASH_COOKIE = 'flash';

const FLASH_COOKIE_OPTIONS: CookieOptions = { httpOnly: true, sameSite: 'lax', path: '/' };
const CATEGORIES: readonly string[] = ['success', 'info', 'warning', 'danger'];

/** The slice of the express response the flash helpers write to. */
export interface FlashResponse {
  locals: Record<string, unknown>;
  cookie(name: string, value: string, options: CookieOptions): unknown;
  clearCookie(name: string, options?: CookieOptions): unknown;
}

export interface FlashRequest {
  cookies?: Record<string, unknown>;
}

function isFlashMessage(value: unknown): value is FlashMessage {
  if (typeof value !== 'object' || value === null) return false;
  if (!('category' in value) || !('message' in value)) return false;
  const { category, message } = value;
  return typeof category === 'string' && CATEGORIES.includes(category) && typeof message === 'string';
}

function pendingFlashes(res: FlashResponse): FlashMessage[] {
  const pending = res.locals.flashes;
  return Array.isArray(pending) ? pending.filter(isFlashMessage) : [];
}

/** Queues a notice for the next rendered page. */
export function pushFlash(res: FlashResponse, category: FlashCategory, message: string): void {
  const flashes = [...pendingFlashes(res), { category, message }];
  res.locals.flashes = flashes;
  res.cookie(FLASH_COOKIE, JSON.stringify(flashes), FLASH_COOKIE_OPTIONS);
}

/** Reads the notices carried by the request and clears the cookie. */
export function consumeFlashes(req: FlashRequest, res: FlashResponse): FlashMessage[] {
  const raw = req.cookies?.[FLASH_COOKIE];
  if (typeof raw !== 'string' || raw === '') return [];

  res.clearCookie(FLASH_COOKIE, FLASH_COOKIE_OPTIONS);
  try {
    const parsed: unknown = JSON.parse(raw);
    return Array.isArray(parsed) ? parsed.filter(isFlashMessage) : [];
  } catch {
    return [];
  }
}
