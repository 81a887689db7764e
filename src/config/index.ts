/**
 * Environment-driven configuration
 *
 * Every setting has a default except the Groq API key, whose absence only
 * disables live answer generation.
 */

import { z } from 'zod';
import { ConfigurationError } from '../utils/error-handler.js';
import { DEFAULT_CATALOG_PATH, DEFAULT_SEED_PATH } from '../storage/seed.js';
import { DEFAULT_TRAVERSAL_DEPTH } from '../core/traversal.js';

export const DEFAULT_MODEL = 'llama-3.1-8b-instant';
export const DEFAULT_GENERATION_TIMEOUT_MS = 30000;

export interface GraphRagConfig {
  /** Groq API key; generation is disabled without it */
  groqApiKey?: string;
  model: string;
  traversalDepth: number;
  generationTimeoutMs: number;
  seedPath: string;
  catalogPath: string;
  /** Print the pipeline trace for each question */
  verbose: boolean;
  server: {
    port: number;
    host: string;
  };
}

const booleanFlag = z
  .enum(['1', '0', 'true', 'false', 'yes', 'no'])
  .transform(value => value === '1' || value === 'true' || value === 'yes');

const envSchema = z.object({
  GROQ_API_KEY: z.string().trim().optional(),
  GRAPHRAG_MODEL: z.string().min(1).default(DEFAULT_MODEL),
  GRAPHRAG_TRAVERSAL_DEPTH: z.coerce.number().int().min(0).default(DEFAULT_TRAVERSAL_DEPTH),
  GRAPHRAG_GENERATION_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_GENERATION_TIMEOUT_MS),
  GRAPHRAG_SEED_PATH: z.string().min(1).default(DEFAULT_SEED_PATH),
  GRAPHRAG_CATALOG_PATH: z.string().min(1).default(DEFAULT_CATALOG_PATH),
  GRAPHRAG_VERBOSE: booleanFlag.default('false'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3001),
  HOST: z.string().min(1).default('127.0.0.1')
});

/**
 * Read configuration from environment variables
 *
 * @throws ConfigurationError when a variable is present but invalid
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): GraphRagConfig {
  // Empty strings count as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  const values = parsed.data;
  return {
    groqApiKey: values.GROQ_API_KEY || undefined,
    model: values.GRAPHRAG_MODEL,
    traversalDepth: values.GRAPHRAG_TRAVERSAL_DEPTH,
    generationTimeoutMs: values.GRAPHRAG_GENERATION_TIMEOUT_MS,
    seedPath: values.GRAPHRAG_SEED_PATH,
    catalogPath: values.GRAPHRAG_CATALOG_PATH,
    verbose: values.GRAPHRAG_VERBOSE,
    server: {
      port: values.PORT,
      host: values.HOST
    }
  };
}
