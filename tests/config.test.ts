import { describe, expect, it } from 'vitest';
import { loadConfig } from '../src/infrastructure/config/Config.js';

const required = { TELEGRAM_BOT_TOKEN: 'test-token', OPENROUTER_API_KEY: 'test-key' };

describe('loadConfig', () => {
  it('applies defaults for everything optional', () => {
    expect(loadConfig(required)).toEqual({
      telegram: { botToken: 'test-token', apiBaseUrl: 'https://api.telegram.org' },
      extraction: {
        apiKey: 'test-key',
        baseUrl: 'https://openrouter.ai/api/v1',
        model: 'google/gemini-2.5-flash-lite',
      },
      appwrite: {
        endpoint: undefined,
        projectId: undefined,
        apiKey: undefined,
        databaseId: 'default',
        collectionId: 'expenses',
      },
      app: { currencySymbol: '₹', requestTimeoutMs: 15_000 },
    });
  });

  it('reads the store settings and numeric values', () => {
    const config = loadConfig({
      ...required,
      APPWRITE_ENDPOINT: 'https://appwrite.example.test/v1',
      APPWRITE_PROJECT_ID: 'test-project',
      APPWRITE_API_KEY: ' ',
      APPWRITE_COLLECTION_ID: 'spending',
      REQUEST_TIMEOUT_MS: '30000',
    });

    expect(config.appwrite).toEqual({
      endpoint: 'https://appwrite.example.test/v1',
      projectId: 'test-project',
      apiKey: undefined,
      databaseId: 'default',
      collectionId: 'spending',
    });
    expect(config.app.requestTimeoutMs).toBe(30_000);
  });

  it('names the missing variables', () => {
    expect(() => loadConfig({ OPENROUTER_API_KEY: 'test-key', REQUEST_TIMEOUT_MS: 'soon' })).toThrow(
      'Invalid configuration, check these environment variables: TELEGRAM_BOT_TOKEN, REQUEST_TIMEOUT_MS',
    );
  });
});
