/**
 * Vitest setup file - runs before every test file.
 *
 * @canopy/config reads the environment when it is first imported, so
 * overrides for the test run go here.
 */

// Keep test output readable; runtime logging is exercised, not asserted.
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'error';
process.env.NODE_SECRET = 'test-secret';
