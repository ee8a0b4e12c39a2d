/**
 * Pipeline configuration
 *
 * Environment variables (loaded from .env by the entry point) are parsed into
 * a zod-validated config. Invalid values fail at startup.
 *
 * @module server/config
 */

import { z } from 'zod';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import { CAPABILITY_NAMES, isCapabilityName, type CapabilityName } from '../models/capability.js';
import { ChunkingConfigSchema } from '../models/chunk.js';
import { ValidationError } from '../utils/validation.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

export const DEFAULT_WORKER_PATH = resolve(__dirname, '../../python/capability_worker.py');

const envBoolean = z
  .union([z.boolean(), z.string()])
  .transform((v) => (typeof v === 'boolean' ? v : !['0', 'false', 'no', 'off', ''].includes(v.trim().toLowerCase())));

const capabilityList = z
  .union([z.array(z.string()), z.string()])
  .transform((v, ctx): CapabilityName[] => {
    const items = (Array.isArray(v) ? v : v.split(','))
      .map((s) => s.trim())
      .filter((s) => s.length > 0);
    const names: CapabilityName[] = [];
    for (const item of items) {
      if (!isCapabilityName(item)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Unknown capability "${item}". Expected one of: ${CAPABILITY_NAMES.join(', ')}`,
        });
        return z.NEVER;
      }
      names.push(item);
    }
    return names;
  });

export const PipelineConfigSchema = z.object({
  pythonPath: z.string().min(1).default('python3'),
  workerPath: z.string().min(1).default(DEFAULT_WORKER_PATH),
  workerTimeoutMs: z.coerce.number().int().positive().default(300_000),
  probeTimeoutMs: z.coerce.number().int().positive().default(120_000),
  useGpu: envBoolean.default(true),
  ocrLang: z.string().min(1).default('en'),
  ocrDpi: z.coerce.number().int().min(72).max(1200).default(300),
  layoutModel: z.string().min(1).default('microsoft/layoutlmv3-base'),
  embeddingModel: z.string().min(1).default('BAAI/bge-large-en-v1.5'),
  disabledCapabilities: capabilityList.default([]),
  maxConcurrent: z.coerce.number().int().min(1).max(64).default(4),
  /** 0 disables the per-item timeout */
  itemTimeoutMs: z.coerce.number().int().min(0).default(0),
  chunking: ChunkingConfigSchema.default({}),
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

type Env = Record<string, string | undefined>;

function numberOrUndefined(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return Number(value);
}

/**
 * Load configuration from environment variables
 *
 * @throws ValidationError when any value is out of range
 */
export function loadPipelineConfig(
  env: Env = process.env,
  overrides: Partial<z.input<typeof PipelineConfigSchema>> = {}
): PipelineConfig {
  const fromEnv = {
    pythonPath: env.LEGAL_PYTHON_PATH || undefined,
    workerPath: env.LEGAL_WORKER_PATH || undefined,
    workerTimeoutMs: env.LEGAL_WORKER_TIMEOUT_MS || undefined,
    probeTimeoutMs: env.LEGAL_PROBE_TIMEOUT_MS || undefined,
    useGpu: env.LEGAL_USE_GPU || undefined,
    ocrLang: env.LEGAL_OCR_LANG || undefined,
    ocrDpi: env.LEGAL_OCR_DPI || undefined,
    layoutModel: env.LEGAL_LAYOUT_MODEL || undefined,
    embeddingModel: env.LEGAL_EMBEDDING_MODEL || undefined,
    disabledCapabilities: env.LEGAL_DISABLED_CAPABILITIES || undefined,
    maxConcurrent: env.LEGAL_MAX_CONCURRENT || undefined,
    itemTimeoutMs: env.LEGAL_ITEM_TIMEOUT_MS || undefined,
    chunking: {
      similarity_threshold: numberOrUndefined(env.LEGAL_SIMILARITY_THRESHOLD),
      min_chunk_size: numberOrUndefined(env.LEGAL_MIN_CHUNK_SIZE),
      max_chunk_size: numberOrUndefined(env.LEGAL_MAX_CHUNK_SIZE),
      chunk_overlap: numberOrUndefined(env.LEGAL_CHUNK_OVERLAP),
    },
  };

  const result = PipelineConfigSchema.safeParse({ ...fromEnv, ...overrides });
  if (!result.success) {
    const message = result.error.errors
      .map((e) => `${e.path.join('.') || 'config'}: ${e.message}`)
      .join('; ');
    throw new ValidationError(`Invalid pipeline configuration: ${message}`);
  }
  return result.data;
}
