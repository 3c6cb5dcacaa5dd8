/** Zod schemas for request bodies accepted by the HTTP API. */

import { z } from 'zod';
import { MAX_RANDOM_SEED } from './constants.js';

const dimension = z.number().int().min(64).max(8192);

export const GenerationParametersSchema = z.object({
  model: z.string().min(1).nullable(),
  sampler: z.object({
    name: z.string().min(1).nullable(),
    steps: z.number().int().min(1).max(1000),
    cfgScale: z.number().min(0).max(100),
    width: dimension,
    height: dimension,
  }),
  seed: z.object({
    value: z.number().int().min(0).max(MAX_RANDOM_SEED),
    randomize: z.boolean(),
  }),
  batchSize: z.number().int().min(1).max(64),
  prompt: z.object({
    positive: z.string().max(20_000),
    negative: z.string().max(20_000),
  }),
  hiresFix: z.object({
    enabled: z.boolean(),
    upscaleMethod: z.string().min(1).nullable(),
    scale: z.number().min(1).max(8),
    sampler: z.string().min(1).nullable(),
    steps: z.number().int().min(1).max(1000),
    denoise: z.number().min(0).max(1),
  }),
});

export const GenerateRequestSchema = z.object({
  parameters: GenerationParametersSchema,
});

export const ConnectRequestSchema = z.object({
  address: z.string().url().optional(),
});

export const PackageExtensionSchema = z.object({
  author: z.string(),
  title: z.string(),
  reference: z.string(),
  files: z.array(z.string()).min(1),
  installType: z.enum(['git-clone', 'copy', 'unknown']),
  description: z.string().optional(),
  pipPackages: z.array(z.string()).optional(),
});

export const InstalledPackageExtensionSchema = z.object({
  paths: z.array(z.string().min(1)),
  gitRepositoryUrl: z.string().optional(),
  version: z.object({
    branch: z.string().optional(),
    commitSha: z.string().optional(),
  }).optional(),
  definition: PackageExtensionSchema.optional(),
});

export const InstallRequestSchema = z.object({
  extensions: z.array(PackageExtensionSchema).min(1),
});

export const UninstallRequestSchema = z.object({
  extensions: z.array(InstalledPackageExtensionSchema).min(1),
});

/** `{ detail, errors }` body for a failed parse, as the routes answer it. */
export function validationFailure(detail: string, error: z.ZodError): { detail: string; errors: Array<{ path: string; message: string }> } {
  return {
    detail,
    errors: error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
  };
}
