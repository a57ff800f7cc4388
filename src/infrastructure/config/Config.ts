import { z } from 'zod';

export interface AppConfig {
  telegram: {
    botToken: string;
    apiBaseUrl: string;
  };
  extraction: {
    apiKey: string;
    baseUrl: string;
    model: string;
  };
  appwrite: {
    endpoint?: string;
    projectId?: string;
    apiKey?: string;
    databaseId: string;
    collectionId: string;
  };
  app: {
    currencySymbol: string;
    requestTimeoutMs: number;
  };
}

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value?.trim() ? value.trim() : undefined));

const EnvSchema = z.object({
  TELEGRAM_BOT_TOKEN: z.string().min(1),
  TELEGRAM_API_BASE_URL: z.string().url().default('https://api.telegram.org'),
  OPENROUTER_API_KEY: z.string().min(1),
  EXTRACTION_BASE_URL: z.string().url().default('https://openrouter.ai/api/v1'),
  EXTRACTION_MODEL: z.string().min(1).default('google/gemini-2.5-flash-lite'),
  APPWRITE_ENDPOINT: optionalString,
  APPWRITE_PROJECT_ID: optionalString,
  APPWRITE_API_KEY: optionalString,
  APPWRITE_DATABASE_ID: z.string().min(1).default('default'),
  APPWRITE_COLLECTION_ID: z.string().min(1).default('expenses'),
  APP_CURRENCY_SYMBOL: z.string().min(1).default('₹'),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
});

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const variables = parsed.error.issues.map((issue) => issue.path.join('.')).join(', ');
    throw new Error(`Invalid configuration, check these environment variables: ${variables}`);
  }

  const vars = parsed.data;

  return {
    telegram: {
      botToken: vars.TELEGRAM_BOT_TOKEN,
      apiBaseUrl: vars.TELEGRAM_API_BASE_URL,
    },
    extraction: {
      apiKey: vars.OPENROUTER_API_KEY,
      baseUrl: vars.EXTRACTION_BASE_URL,
      model: vars.EXTRACTION_MODEL,
    },
    appwrite: {
      endpoint: vars.APPWRITE_ENDPOINT,
      projectId: vars.APPWRITE_PROJECT_ID,
      apiKey: vars.APPWRITE_API_KEY,
      databaseId: vars.APPWRITE_DATABASE_ID,
      collectionId: vars.APPWRITE_COLLECTION_ID,
    },
    app: {
      currencySymbol: vars.APP_CURRENCY_SYMBOL,
      requestTimeoutMs: vars.REQUEST_TIMEOUT_MS,
    },
  };
};
