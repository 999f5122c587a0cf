import { generateClientId, identityCookieOptions, resolveClientId } from '../../src/identity/client-identity';

describe('Client identity', () => {
  it('should use a present cookie value as the client id', () => {
    expect(resolveClientId('abc123')).toEqual({ clientId: 'abc123', issued: false });
  });

  it('should mint a 32-hex id when the cookie is missing or empty', () => {
    for (const value of [undefined, null, '']) {
      const resolved = resolveClientId(value);
      expect(resolved.issued).toBe(true);
      expect(resolved.clientId).toMatch(/^[0-9a-f]{32}$/);
    }
  });

  it('should not repeat generated ids', () => {
    const ids = new Set(Array.from({ length: 50 }, () => generateClientId()));
    expect(ids.size).toBe(50);
  });

  it('should build http-only, same-site lax, long-lived cookie options', () => {
    expect(identityCookieOptions({ name: 'rv_client_id', maxAgeDays: 365, secure: false })).toEqual({
      path: '/',
      httpOnly: true,
      sameSite: 'lax',
      secure: false,
      maxAge: 31_536_000,
    });
  });
});
