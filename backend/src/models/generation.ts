/** Parameters of one text-to-image request and the images it publishes. */

export interface SamplerParameters {
  name: string | null;
  steps: number;
  cfgScale: number;
  width: number;
  height: number;
}

export interface SeedParameters {
  value: number;
  randomize: boolean;
}

export interface PromptParameters {
  positive: string;
  negative: string;
}

export interface HiresFixParameters {
  enabled: boolean;
  upscaleMethod: string | null;
  scale: number;
  /** Falls back to the first pass sampler when null. */
  sampler: string | null;
  steps: number;
  denoise: number;
}

export interface GenerationParameters {
  model: string | null;
  sampler: SamplerParameters;
  seed: SeedParameters;
  batchSize: number;
  prompt: PromptParameters;
  hiresFix: HiresFixParameters;
}

export type ImageSourceKind = 'grid' | 'output';

/** A published result image. Exactly one of localPath / url is set. */
export interface ImageSource {
  kind: ImageSourceKind;
  name: string;
  localPath?: string;
  url?: string;
}

export type GenerationStatus = 'running' | 'completed' | 'canceled' | 'failed';
