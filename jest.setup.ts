/**
 * Jest Setup
 *
 * Runs before every test file, ahead of any module imports,
 * so loggers created at import time pick up the quiet level.
 */

process.env.LOG_LEVEL = "silent";
