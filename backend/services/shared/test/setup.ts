// backend/services/shared/test/setup.ts
/**
 * Hermetic defaults for tests ONLY (never in service code).
 * Runs before each spec file imports anything, so the root logger starts silent.
 */
process.env.NODE_ENV ??= "test";
process.env.LOG_LEVEL = "silent";
