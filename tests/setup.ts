/**
 * Test Setup
 *
 * Setup file for tests, imported by vitest.config.ts.
 * Keeps pino quiet unless a test passes its own logger.
 */

process.env.HARNESSLINK_LOG_LEVEL = "silent";
