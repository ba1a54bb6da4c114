import { loadAppConfig } from '../app.config.js';

describe('loadAppConfig', () => {
  it('applies defaults to an empty environment', () => {
    expect(loadAppConfig({})).toEqual({
      nodeEnv: 'development',
      isProduction: false,
      host: '0.0.0.0',
      port: 3000,
      storeDriver: 'sqlite',
      databasePath: 'data/records.sqlite',
      scanBatchSize: 64,
      apiKey: null,
      graphiql: true,
    });
  });

  it('treats blank values as unset', () => {
    const config = loadAppConfig({ PORT: '  ', STORE_DRIVER: '', DATABASE_PATH: ' ' });
    expect(config.port).toBe(3000);
    expect(config.storeDriver).toBe('sqlite');
    expect(config.databasePath).toBe('data/records.sqlite');
  });

  it('reads explicit values', () => {
    const config = loadAppConfig({
      HOST: '127.0.0.1',
      PORT: '8080',
      STORE_DRIVER: 'memory',
      STORE_SCAN_BATCH_SIZE: '8',
      GRAPHIQL: 'false',
    });
    expect(config.host).toBe('127.0.0.1');
    expect(config.port).toBe(8080);
    expect(config.storeDriver).toBe('memory');
    expect(config.scanBatchSize).toBe(8);
    expect(config.graphiql).toBe(false);
  });

  it('names the offending variable', () => {
    expect(() => loadAppConfig({ PORT: 'abc' })).toThrow(
      'Invalid environment configuration (PORT: PORT must be a positive integer.)',
    );
    expect(() => loadAppConfig({ STORE_DRIVER: 'redis' })).toThrow(
      'Invalid environment configuration (STORE_DRIVER: STORE_DRIVER must be "sqlite" or "memory".)',
    );
  });

  it('rejects a zero batch size', () => {
    expect(() => loadAppConfig({ STORE_SCAN_BATCH_SIZE: '0' })).toThrow(
      'STORE_SCAN_BATCH_SIZE must be a positive integer.',
    );
  });

  it('requires API_KEY in production', () => {
    expect(() => loadAppConfig({ NODE_ENV: 'production' })).toThrow(
      'API_KEY environment variable is required in production',
    );
  });

  it('turns GraphiQL off in production unless asked for', () => {
    const prod = loadAppConfig({ NODE_ENV: 'production', API_KEY: 'test-secret' });
    expect(prod.isProduction).toBe(true);
    expect(prod.apiKey).toBe('test-secret');
    expect(prod.graphiql).toBe(false);

    const withGraphiql = loadAppConfig({
      NODE_ENV: 'production',
      API_KEY: 'test-secret',
      GRAPHIQL: 'true',
    });
    expect(withGraphiql.graphiql).toBe(true);
  });
});
