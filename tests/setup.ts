/**
 * Root test setup file
 *
 * Runs before every test file, ahead of any module that builds a logger.
 * Console logging stays off so reporter output is not interleaved with it;
 * file logging never runs under NODE_ENV=test.
 */

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL ??= 'warn';
process.env.LOG_CONSOLE ??= 'false';
