/**
 * Client Identity
 *
 * The identity cookie is a bearer value: whoever presents it is treated as the
 * same device. It is matched by exact string equality and never signed, so it
 * grants ownership of reviews, not authentication.
 */

import { randomBytes } from 'crypto';
import type { CookieSerializeOptions } from '@fastify/cookie';

export interface ResolvedIdentity {
  clientId: string;
  /** True when the id was minted for this request and the cookie must be set */
  issued: boolean;
}

export interface IdentityCookieConfig {
  name: string;
  maxAgeDays: number;
  secure: boolean;
}

/** 128 bits, 32 hex characters */
export function generateClientId(): string {
  return randomBytes(16).toString('hex');
}

export function resolveClientId(cookieValue: string | null | undefined): ResolvedIdentity {
  if (cookieValue) {
    return { clientId: cookieValue, issued: false };
  }
  return { clientId: generateClientId(), issued: true };
}

export function identityCookieOptions(config: IdentityCookieConfig): CookieSerializeOptions {
  return {
    path: '/',
    httpOnly: true,
    sameSite: 'lax',
    secure: config.secure,
    maxAge: config.maxAgeDays * 24 * 60 * 60,
  };
}
