/**
 * test/setup-env.ts
 *
 * Test defaults so config parsing and the logger never depend on the developer's .env.
 * E2E helpers build the app over the in-memory store; nothing here reaches AWS or Redis.
 */

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'error';
process.env.SERVICE_NAME = process.env.SERVICE_NAME ?? 'user-crud-service-test';
process.env.TABLE_NAME = process.env.TABLE_NAME ?? 'users-test';
process.env.USER_STORE_DRIVER = process.env.USER_STORE_DRIVER ?? 'memory';
