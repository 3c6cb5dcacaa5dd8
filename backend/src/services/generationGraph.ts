/** Builds the text-to-image node graph submitted to the inference backend. */

import type { NodeGraph } from '../models/comfy.js';
import type { GenerationParameters } from '../models/generation.js';
import { OUTPUT_FILENAME_PREFIX, OUTPUT_NODE_NAME } from '../utils/constants.js';

/**
 * Assemble a fresh graph from the current parameters. Base pipeline:
 * checkpoint loader -> empty latent -> sampler (conditioned by the two text
 * encoders) -> VAE decode -> save. With hi-res fix enabled a latent upscale and
 * a second sampler are appended and the decoder reads from the second sampler.
 *
 * Missing model or sampler names are passed through as null; the backend
 * rejects them.
 */
export function buildTextToImageGraph(params: GenerationParameters): NodeGraph {
  const { sampler, seed, prompt, hiresFix } = params;

  const graph: NodeGraph = {
    CheckpointLoader: {
      class_type: 'CheckpointLoaderSimple',
      inputs: {
        ckpt_name: params.model,
      },
    },
    EmptyLatentImage: {
      class_type: 'EmptyLatentImage',
      inputs: {
        batch_size: params.batchSize,
        height: sampler.height,
        width: sampler.width,
      },
    },
    Sampler: {
      class_type: 'KSampler',
      inputs: {
        cfg: sampler.cfgScale,
        denoise: 1,
        latent_image: ['EmptyLatentImage', 0],
        model: ['CheckpointLoader', 0],
        negative: ['NegativeCLIP', 0],
        positive: ['PositiveCLIP', 0],
        sampler_name: sampler.name,
        scheduler: 'normal',
        seed: seed.value,
        steps: sampler.steps,
      },
    },
    PositiveCLIP: {
      class_type: 'CLIPTextEncode',
      inputs: {
        clip: ['CheckpointLoader', 1],
        text: prompt.positive,
      },
    },
    NegativeCLIP: {
      class_type: 'CLIPTextEncode',
      inputs: {
        clip: ['CheckpointLoader', 1],
        text: prompt.negative,
      },
    },
    VAEDecoder: {
      class_type: 'VAEDecode',
      inputs: {
        samples: ['Sampler', 0],
        vae: ['CheckpointLoader', 2],
      },
    },
    [OUTPUT_NODE_NAME]: {
      class_type: 'SaveImage',
      inputs: {
        filename_prefix: OUTPUT_FILENAME_PREFIX,
        images: ['VAEDecoder', 0],
      },
    },
  };

  if (hiresFix.enabled) {
    graph.LatentUpscale = {
      class_type: 'LatentUpscale',
      inputs: {
        upscale_method: hiresFix.upscaleMethod,
        width: Math.round(sampler.width * hiresFix.scale),
        height: Math.round(sampler.height * hiresFix.scale),
        crop: 'disabled',
        samples: ['Sampler', 0],
      },
    };

    graph.Sampler2 = {
      class_type: 'KSampler',
      inputs: {
        cfg: sampler.cfgScale,
        denoise: hiresFix.denoise,
        latent_image: ['LatentUpscale', 0],
        model: ['CheckpointLoader', 0],
        negative: ['NegativeCLIP', 0],
        positive: ['PositiveCLIP', 0],
        sampler_name: hiresFix.sampler ?? sampler.name,
        scheduler: 'normal',
        seed: seed.value,
        steps: hiresFix.steps,
      },
    };

    graph.VAEDecoder.inputs.samples = ['Sampler2', 0];
  }

  return graph;
}
