/**
 * Seed data loading for graph construction and entity recognition
 *
 * Reads JSON files from disk and validates them with zod before anything is
 * built. Shape problems are construction errors: the process cannot start
 * without a valid graph.
 */

import { readFileSync, existsSync } from 'fs';
import { isAbsolute, join } from 'path';
import { z } from 'zod';
import type { GraphSeeds } from '../core/types.js';
import type { EntityCatalog } from '../extraction/entity-recognizer.js';
import { GraphConstructionError } from '../utils/error-handler.js';

const attributeValueSchema = z.union([z.string(), z.number(), z.boolean()]);

const personSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  role: z.string().optional(),
  extra: z.record(attributeValueSchema).optional()
});

const organizationSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  industry: z.string().optional(),
  extra: z.record(attributeValueSchema).optional()
});

const relationshipSchema = z.object({
  source: z.string().min(1),
  target: z.string().min(1),
  relation: z.string().min(1),
  attributes: z.record(attributeValueSchema).default({})
});

export const graphSeedsSchema = z.object({
  people: z.array(personSchema).default([]),
  organizations: z.array(organizationSchema).default([]),
  relationships: z.array(relationshipSchema).default([])
});

export const entityCatalogSchema = z.object({
  entities: z.array(z.object({
    name: z.string().min(1),
    aliases: z.array(z.string().min(1)).default([])
  })),
  personSurnames: z.array(z.string().min(1)).default([])
});

export const DEFAULT_SEED_PATH = 'data/knowledge-graph.json';
export const DEFAULT_CATALOG_PATH = 'data/entity-catalog.json';

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/**
 * Validate raw seed data against the bootstrap contract
 */
export function parseSeedData(raw: unknown): GraphSeeds {
  const parsed = graphSeedsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new GraphConstructionError('Invalid seed data', formatIssues(parsed.error));
  }
  return parsed.data;
}

export function parseEntityCatalog(raw: unknown): EntityCatalog {
  const parsed = entityCatalogSchema.safeParse(raw);
  if (!parsed.success) {
    throw new GraphConstructionError('Invalid entity catalog', formatIssues(parsed.error));
  }
  return parsed.data;
}

function readJson(filePath: string): unknown {
  const fullPath = isAbsolute(filePath) ? filePath : join(process.cwd(), filePath);

  if (!existsSync(fullPath)) {
    throw new GraphConstructionError(`Seed file not found: ${fullPath}`);
  }

  try {
    return JSON.parse(readFileSync(fullPath, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new GraphConstructionError(`Seed file ${fullPath} is not valid JSON`, [reason]);
  }
}

/**
 * Load graph seeds from a JSON file (relative to the working directory)
 */
export function loadSeedFile(filePath: string = DEFAULT_SEED_PATH): GraphSeeds {
  return parseSeedData(readJson(filePath));
}

export function loadEntityCatalog(filePath: string = DEFAULT_CATALOG_PATH): EntityCatalog {
  return parseEntityCatalog(readJson(filePath));
}
