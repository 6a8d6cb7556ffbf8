import {afterEach, beforeEach, describe, expect, it, vi} from 'vitest';
import {createApp} from '../index';
import {
  createTestDatabase,
  testConfig,
  type TestDatabase,
} from './helpers/test-database';

describe('createApp', () => {
  let testDatabase: TestDatabase;

  beforeEach(async () => {
    testDatabase = await createTestDatabase();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await testDatabase.cleanup();
  });

  it('should log requests outside of tests', async () => {
    const log = vi.spyOn(console, 'log');
    log.mockClear();
    const app = createApp({
      database: testDatabase.database,
      config: {...testConfig, nodeEnv: 'development'},
    });

    await app.request('/nope');

    expect(log).toHaveBeenCalledWith('<-- GET /nope');
  });

  it('should not log requests when running tests', async () => {
    const log = vi.spyOn(console, 'log');
    log.mockClear();
    const app = createApp({database: testDatabase.database, config: testConfig});

    await app.request('/nope');

    expect(log).not.toHaveBeenCalled();
  });
});
