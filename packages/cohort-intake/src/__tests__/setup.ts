/**
 * Global Test Setup for cohort intake
 *
 * Service loggers read LOG_LEVEL when their module loads; keep test output
 * to errors unless a level is set explicitly.
 */

if (process.env.LOG_LEVEL === undefined) {
  process.env.LOG_LEVEL = 'error';
}
