/** Backend configuration from environment variables, validated with zod. */

import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';
import { DEFAULT_COMFY_BASE_URL } from './constants.js';

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((v) => v === 'true' || v === '1' || v === 'yes');

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  COMFY_BASE_URL: z.string().url().default(DEFAULT_COMFY_BASE_URL),
  COMFY_OUTPUT_DIR: z.string().min(1).optional(),
  INFERENCE_DESK_DATA_DIR: z.string().min(1).optional(),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error']).default('info'),
  COMFY_AUTO_CONNECT: booleanFlag.default('false'),
});

export interface AppConfig {
  port: number;
  comfyBaseUrl: string;
  comfyOutputDir: string | null;
  dataDir: string;
  /** Where grid images go when the inference backend has no local output directory. */
  gridDir: string;
  logDir: string;
  packagesFile: string;
  logLevel: 'trace' | 'debug' | 'info' | 'warn' | 'error';
  autoConnect: boolean;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }
  const vars = parsed.data;
  const dataDir = expandHome(vars.INFERENCE_DESK_DATA_DIR ?? path.join(os.homedir(), '.inference-desk'));

  return {
    port: vars.PORT,
    comfyBaseUrl: vars.COMFY_BASE_URL,
    comfyOutputDir: vars.COMFY_OUTPUT_DIR ? path.resolve(expandHome(vars.COMFY_OUTPUT_DIR)) : null,
    dataDir,
    gridDir: path.join(dataDir, 'grids'),
    logDir: path.join(dataDir, 'logs'),
    packagesFile: path.join(dataDir, 'packages.json'),
    logLevel: vars.LOG_LEVEL,
    autoConnect: vars.COMFY_AUTO_CONNECT,
  };
}

function expandHome(p: string): string {
  if (p === '~') return os.homedir();
  if (p.startsWith('~/')) return path.join(os.homedir(), p.slice(2));
  return path.resolve(p);
}
