/**
 * Vitest setup file - runs before each test file
 */
process.env.NODE_ENV = "test";
process.env.LOG_LEVEL = "silent";
delete process.env.MPIN_OUTPUT;
