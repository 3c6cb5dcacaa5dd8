import type { GenerationParameters, InferenceOptions } from '../types';

export const MAX_SEED = 0xffff_ffff;

export function randomSeed(random: () => number = Math.random): number {
  return Math.floor(random() * (MAX_SEED + 1));
}

export function defaultParameters(seed = randomSeed()): GenerationParameters {
  return {
    model: null,
    sampler: { name: null, steps: 20, cfgScale: 7, width: 512, height: 512 },
    seed: { value: seed, randomize: true },
    batchSize: 1,
    prompt: { positive: '', negative: '' },
    hiresFix: {
      enabled: false,
      upscaleMethod: 'nearest-exact',
      scale: 1.5,
      sampler: null,
      steps: 10,
      denoise: 0.7,
    },
  };
}

function keepOrFirst(current: string | null, choices: string[]): string | null {
  if (current !== null && choices.includes(current)) return current;
  return choices[0] ?? null;
}

/**
 * Point selections that the backend no longer offers at its first option.
 * The hi-res sampler stays null so it follows the first pass sampler.
 */
export function applyOptions(params: GenerationParameters, options: InferenceOptions): GenerationParameters {
  const hiresSampler = params.hiresFix.sampler;
  return {
    ...params,
    model: keepOrFirst(params.model, options.models),
    sampler: { ...params.sampler, name: keepOrFirst(params.sampler.name, options.samplers) },
    hiresFix: {
      ...params.hiresFix,
      upscaleMethod: keepOrFirst(params.hiresFix.upscaleMethod, options.upscaleMethods),
      sampler: hiresSampler !== null && options.samplers.includes(hiresSampler) ? hiresSampler : null,
    },
  };
}
