import { corsOrigins, validateEnvironment } from './configuration';

describe('validateEnvironment', () => {
  it('fills defaults around the required Gemini key', () => {
    const env = validateEnvironment({ GEMINI_API_KEY: 'test-secret' });

    expect(env.PORT).toBe(8787);
    expect(env.STORAGE_NAMESPACE).toBe('filings-chat');
    expect(env.GEMINI_CHAT_MODEL).toBe('gemini-2.5-flash');
    expect(env.VERBOSE).toBe(false);
  });

  it('coerces numbers and flags from strings', () => {
    const env = validateEnvironment({ GEMINI_API_KEY: 'test-secret', DB_PORT: '3307', VERBOSE: 'true' });

    expect(env.DB_PORT).toBe(3307);
    expect(env.VERBOSE).toBe(true);
  });

  it('splits CORS origins into a trimmed list', () => {
    const env = validateEnvironment({ GEMINI_API_KEY: 'test-secret', CORS_ORIGINS: ' https://a.test , ,https://b.test' });

    expect(env.CORS_ORIGINS).toEqual(['https://a.test', 'https://b.test']);
  });

  it('lists every invalid variable', () => {
    expect(() => validateEnvironment({ STORAGE_NAMESPACE: 'Bad Namespace' })).toThrow(
      'Invalid environment configuration: STORAGE_NAMESPACE: must be a lowercase Elasticsearch index prefix; GEMINI_API_KEY: Required',
    );
  });
});

describe('corsOrigins', () => {
  it('parses a raw value the same way as the validated environment', () => {
    expect(corsOrigins('https://a.test,https://b.test ')).toEqual(['https://a.test', 'https://b.test']);
  });

  it('falls back to the default origin', () => {
    expect(corsOrigins(undefined)).toEqual(['http://localhost:3000']);
  });
});
