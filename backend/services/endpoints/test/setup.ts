// backend/services/endpoints/test/setup.ts

// Hermetic defaults for tests ONLY (never in service code).
process.env.NODE_ENV ??= "test";
process.env.LOG_LEVEL ??= "silent";
process.env.SERVICE_NAME ??= "endpoints-test";
