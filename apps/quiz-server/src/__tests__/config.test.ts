import { describe, it, expect } from 'vitest';
import { loadServerConfig } from '../config';

describe('loadServerConfig', () => {
  it('falls back to defaults', () => {
    expect(loadServerConfig({})).toEqual({
      port: 3021,
      verifyToken: 'MY_TEST_TOKEN',
      dataDir: './deploy/data',
      deliveryMode: 'async',
      graphApiUrl: 'https://graph.facebook.com/v12.0',
      logging: { LOG_LEVEL: 'INFO' },
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadServerConfig({
      PORT: '8080',
      TOKEN: 'test-token',
      DATA_DIR: '/srv/quiz',
      DELIVERY_MODE: 'sync',
      GRAPH_API_URL: 'http://localhost:9000/',
    });
    expect(config).toMatchObject({
      port: 8080,
      verifyToken: 'test-token',
      dataDir: '/srv/quiz',
      deliveryMode: 'sync',
      graphApiUrl: 'http://localhost:9000',
    });
  });

  it('reads logger settings', () => {
    const config = loadServerConfig({
      LOG_LEVEL: 'debug',
      AXIOM_TOKEN: 'test-token',
      AXIOM_ORG_ID: 'test-org',
      AXIOM_DATASET: 'quiz-test',
    });
    expect(config.logging).toEqual({
      LOG_LEVEL: 'DEBUG',
      AXIOM_TOKEN: 'test-token',
      AXIOM_ORG_ID: 'test-org',
      AXIOM_DATASET: 'quiz-test',
    });
  });

  it('rejects invalid values', () => {
    expect(() => loadServerConfig({ PORT: 'abc' })).toThrow();
    expect(() => loadServerConfig({ DELIVERY_MODE: 'later' })).toThrow();
    expect(() => loadServerConfig({ GRAPH_API_URL: 'not a url' })).toThrow();
  });

  it('rejects an unknown log level', () => {
    expect(() => loadServerConfig({ LOG_LEVEL: 'chatty' })).toThrow();
  });

  it('rejects an empty Axiom token', () => {
    expect(() => loadServerConfig({ AXIOM_TOKEN: '' })).toThrow();
  });
});
