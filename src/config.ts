import path from 'node:path';
import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  DATA_DIR: z.string().min(1).default('.data'),
  DEFAULT_STRATEGY: z.enum(['similarity-ranking', 'keyword-groups']).default('similarity-ranking'),
  THEMATIC_CATEGORIES_PATH: z.string().min(1).default(path.join('config', 'thematic-categories.json')),
});

export type AppConfig = {
  port: number;
  dataDir: string;
  defaultStrategy: z.infer<typeof envSchema>['DEFAULT_STRATEGY'];
  thematicCategoriesPath: string;
};

const emptyToUndefined = (value: string | undefined): string | undefined =>
  value === undefined || value.trim() === '' ? undefined : value;

export const parseConfig = (env: Record<string, string | undefined>): AppConfig => {
  const validation = envSchema.safeParse({
    PORT: emptyToUndefined(env.PORT),
    DATA_DIR: emptyToUndefined(env.DATA_DIR),
    DEFAULT_STRATEGY: emptyToUndefined(env.DEFAULT_STRATEGY),
    THEMATIC_CATEGORIES_PATH: emptyToUndefined(env.THEMATIC_CATEGORIES_PATH),
  });

  if (!validation.success) {
    const keys = Array.from(new Set(validation.error.issues.map((issue) => issue.path.join('.'))));
    throw new Error(`Invalid environment configuration: ${keys.join(', ')}`);
  }

  const parsed = validation.data;

  return {
    port: parsed.PORT,
    dataDir: path.resolve(parsed.DATA_DIR),
    defaultStrategy: parsed.DEFAULT_STRATEGY,
    thematicCategoriesPath: path.resolve(parsed.THEMATIC_CATEGORIES_PATH),
  };
};

let cached: AppConfig | null = null;

export const getConfig = (): AppConfig => {
  if (!cached) {
    cached = parseConfig(process.env);
  }
  return cached;
};
