/**
 * Setup file for API tests.
 * Disables the bearer token gate so route tests need no tokens, and
 * provides a JWT secret long enough for the config schema.
 */

process.env.AUTH_DISABLED = 'true';

if (!process.env.JWT_SECRET) {
  process.env.JWT_SECRET = 'test-secret-test-secret-test-secret';
}
