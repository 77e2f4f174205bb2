/**
 * Global Test Setup
 *
 * Runs before every test file. Loggers read LOG_LEVEL when their module
 * loads, so the level is pinned here rather than in a hook.
 */

if (process.env.LOG_LEVEL === undefined) {
  process.env.LOG_LEVEL = 'error';
}

export const isCI = process.env.CI === 'true';
