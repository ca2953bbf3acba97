import fs from 'node:fs';
import { z } from 'zod';

import { getConfig } from '../config';
import { ThematicCategory } from '../consistency/schema';

const keywordConfigSchema = z.object({
  categories: z
    .array(
      z.object({
        name: z.string().min(1, 'category name is required'),
        keywords: z.array(z.string().min(1)),
      }),
    )
    .min(1, 'at least one category is required'),
  actionVerbs: z.array(z.string().min(1)).min(1, 'at least one action verb is required'),
});

export type KeywordConfig = {
  categories: ThematicCategory[];
  actionVerbs: string[];
};

export const parseKeywordConfig = (raw: unknown): KeywordConfig => {
  const validation = keywordConfigSchema.safeParse(raw);

  if (!validation.success) {
    const detail = validation.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid thematic category configuration: ${detail}`);
  }

  return validation.data;
};

export const loadKeywordConfig = (filePath: string): KeywordConfig => {
  let raw: unknown;

  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new Error(`Failed to read thematic categories from ${filePath}: ${(error as Error).message}`);
  }

  return parseKeywordConfig(raw);
};

let cachedDefaults: KeywordConfig | null = null;

export const getDefaultKeywordConfig = (): KeywordConfig => {
  if (!cachedDefaults) {
    cachedDefaults = loadKeywordConfig(getConfig().thematicCategoriesPath);
  }
  return cachedDefaults;
};
