import { loadEnv, resetEnv } from '../src/config/env';

describe('loadEnv', () => {
  beforeEach(() => {
    resetEnv();
  });

  test('applies defaults for optional settings', () => {
    expect(loadEnv({ DB_PATH: ':memory:', API_KEY: 'test-secret' })).toEqual({
      NODE_ENV: 'development',
      PORT: 3000,
      DB_PATH: ':memory:',
      API_KEY: 'test-secret'
    });
  });

  test('coerces the port from its string form', () => {
    const env = loadEnv({ DB_PATH: 'shopping.db', API_KEY: 'test-secret', PORT: '8080' });

    expect(env.PORT).toBe(8080);
  });

  test('fails when the database path is missing', () => {
    expect(() => loadEnv({ API_KEY: 'test-secret' })).toThrow(/^Invalid environment configuration: DB_PATH: /);
  });

  test('fails when the API key is empty', () => {
    expect(() => loadEnv({ DB_PATH: ':memory:', API_KEY: '' })).toThrow(/API_KEY/);
  });

  test('caches the first successful load until reset', () => {
    const first = loadEnv({ DB_PATH: 'first.db', API_KEY: 'test-secret' });
    const second = loadEnv({ DB_PATH: 'second.db', API_KEY: 'test-secret' });

    expect(second).toBe(first);

    resetEnv();
    expect(loadEnv({ DB_PATH: 'second.db', API_KEY: 'test-secret' }).DB_PATH).toBe('second.db');
  });
});
