import {describe, expect, it} from 'vitest';
import {loadConfig} from '../config';

describe('loadConfig', () => {
  it('should fall back to defaults', () => {
    expect(loadConfig({})).toEqual({
      nodeEnv: 'development',
      port: 8000,
      database: {
        DATABASE_URL: 'file:theater.db',
        DATABASE_AUTH_TOKEN: undefined,
      },
      apiBasePath: '/theater',
      corsOrigins: [],
    });
  });

  it('should read values from the environment', () => {
    const config = loadConfig({
      NODE_ENV: 'production',
      PORT: '3000',
      DATABASE_URL: 'libsql://catalog.example.test',
      DATABASE_AUTH_TOKEN: 'test-token',
      API_BASE_PATH: '/api/v1/theater',
      CORS_ORIGINS: 'https://a.example.test, https://b.example.test,',
    });

    expect(config).toEqual({
      nodeEnv: 'production',
      port: 3000,
      database: {
        DATABASE_URL: 'libsql://catalog.example.test',
        DATABASE_AUTH_TOKEN: 'test-token',
      },
      apiBasePath: '/api/v1/theater',
      corsOrigins: ['https://a.example.test', 'https://b.example.test'],
    });
  });

  it('should treat an empty auth token as missing', () => {
    expect(loadConfig({DATABASE_AUTH_TOKEN: ''}).database).toEqual({
      DATABASE_URL: 'file:theater.db',
      DATABASE_AUTH_TOKEN: undefined,
    });
  });

  it('should reject a base path with a trailing slash', () => {
    expect(() => loadConfig({API_BASE_PATH: '/theater/'})).toThrow(
      'Invalid configuration: API_BASE_PATH: API_BASE_PATH must start with "/" and must not end with "/"',
    );
  });

  it('should reject a port that is not a number', () => {
    expect(() => loadConfig({PORT: 'eighty'})).toThrow(
      /^Invalid configuration: PORT: /,
    );
  });
});
