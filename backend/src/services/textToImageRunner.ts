/** Runs one text-to-image generation against the connected inference backend. */

import fs from 'node:fs/promises';
import path from 'node:path';
import { randomInt } from 'node:crypto';
import type { ComfyImage } from '../models/comfy.js';
import type { GenerationParameters, GenerationStatus, ImageSource } from '../models/generation.js';
import type { InferenceEvent } from '../models/events.js';
import type { InferenceClient } from './comfy/comfyClient.js';
import type { ComfyTask, Disposable } from './comfy/comfyTask.js';
import { ComfyApiError } from './comfy/errors.js';
import { imageToFilePath, imageToUri } from './comfy/comfyImage.js';
import { buildTextToImageGraph } from './generationGraph.js';
import { composeImageGrid, loadImageBytes } from './imageGrid.js';
import { INTERRUPT_TIMEOUT_MS, MAX_RANDOM_SEED, OUTPUT_NODE_NAME } from '../utils/constants.js';
import { isAbortError, waitWithSignal, withTimeout } from '../utils/withTimeout.js';
import { Logger, errorMessage } from '../utils/logger.js';

/** Read access to the current connection. Satisfied by InferenceClientManager. */
export interface ClientSource {
  readonly isConnected: boolean;
  readonly client: InferenceClient;
}

export interface TextToImageRunnerOptions {
  clients: ClientSource;
  send: (event: InferenceEvent) => void;
  /** Grid images go here when the backend has no local output directory. */
  gridDir: string;
  logger?: Logger;
  randomSeed?: () => number;
}

export type GenerationOutcome = Exclude<GenerationStatus, 'running'>;

export class TextToImageRunner {
  private readonly logger: Logger;
  private readonly randomSeed: () => number;

  constructor(private readonly options: TextToImageRunnerOptions) {
    this.logger = (options.logger ?? Logger.create()).child('TextToImage');
    this.randomSeed = options.randomSeed ?? (() => randomInt(0, MAX_RANDOM_SEED + 1));
  }

  /**
   * Generate and publish images. Cancellation resolves as 'canceled'; an API
   * error is reported as an event and resolves as 'failed'. Anything else rejects.
   */
  async generate(generationId: string, params: GenerationParameters, signal: AbortSignal): Promise<GenerationOutcome> {
    try {
      return await this.generateImage(generationId, params, signal);
    } catch (err) {
      if (signal.aborted || isAbortError(err)) {
        this.logger.debug('Generation canceled', { generationId });
        return 'canceled';
      }
      throw err;
    }
  }

  private async generateImage(
    generationId: string,
    params: GenerationParameters,
    signal: AbortSignal,
  ): Promise<GenerationOutcome> {
    const { clients, send } = this.options;
    if (!clients.isConnected) {
      send({ type: 'notification', title: 'Client not connected', message: 'Please connect first' });
      return 'failed';
    }
    const client = clients.client;

    let parameters = params;
    if (params.seed.randomize) {
      const seed = this.randomSeed();
      parameters = { ...params, seed: { ...params.seed, value: seed } };
      send({ type: 'seed_changed', generation_id: generationId, seed });
    }

    const graph = buildTextToImageGraph(parameters);
    const subscriptions: Disposable[] = [];
    let task: ComfyTask | null = null;

    try {
      subscriptions.push(client.onPreviewImage((image) => {
        send({
          type: 'generation_preview',
          generation_id: generationId,
          format: image.format,
          data: image.bytes.toString('base64'),
        });
      }));

      const onAbort = () => this.interrupt(client, generationId);
      signal.addEventListener('abort', onAbort, { once: true });
      subscriptions.push({ dispose: () => signal.removeEventListener('abort', onAbort) });
      signal.throwIfAborted();

      try {
        task = await waitWithSignal(client.queuePrompt(graph, signal), signal);
      } catch (err) {
        if (!(err instanceof ComfyApiError)) throw err;
        this.logger.warn('Prompt rejected', { generationId, status: err.status, error: err.message });
        send({
          type: 'api_error',
          generation_id: generationId,
          title: 'Api Error',
          message: err.message,
          details: err.responseBody,
        });
        return 'failed';
      }

      subscriptions.push(task.onProgress((update) => {
        const progress = `(${update.value} / ${update.maximum})`;
        send({
          type: 'generation_progress',
          generation_id: generationId,
          value: update.value,
          maximum: update.maximum,
          text: update.runningNode ? `${progress} ${update.runningNode}` : progress,
          is_indeterminate: false,
        });
      }));

      await waitWithSignal(task.completion, signal);
      const outputs = await client.getImagesForExecutedPrompt(task.id, signal);

      send({ type: 'images_cleared', generation_id: generationId });

      const images = (outputs[OUTPUT_NODE_NAME] ?? []).map((image) => this.toImageSource(client, image));
      if (images.length === 0) {
        this.logger.warn('Prompt produced no images', { generationId, promptId: task.id });
        return 'completed';
      }

      const published = images.length > 1
        ? [await this.writeGrid(client, images, signal), ...images]
        : images;
      send({ type: 'generation_images', generation_id: generationId, images: published });
      return 'completed';
    } finally {
      send({
        type: 'generation_progress',
        generation_id: generationId,
        value: 0,
        maximum: 0,
        text: '',
        is_indeterminate: false,
      });
      send({ type: 'generation_preview_cleared', generation_id: generationId });
      for (const subscription of subscriptions) subscription.dispose();
      task?.dispose();
    }
  }

  /** Fire-and-forget interrupt; the generation flow does not wait for it. */
  private interrupt(client: InferenceClient, generationId: string): void {
    this.logger.info('Cancelling prompt', { generationId });
    const controller = new AbortController();
    void withTimeout(client.interruptPrompt(controller.signal), INTERRUPT_TIMEOUT_MS, {
      abortController: controller,
      message: 'Interrupt request timed out',
    })
      .catch((err: unknown) => {
        this.logger.warn('Interrupt failed', { generationId, error: errorMessage(err) });
      });
  }

  private toImageSource(client: InferenceClient, image: ComfyImage): ImageSource {
    if (client.outputImagesDir) {
      return { kind: 'output', name: image.filename, localPath: imageToFilePath(image, client.outputImagesDir) };
    }
    return { kind: 'output', name: image.filename, url: imageToUri(image, client.baseAddress) };
  }

  private async writeGrid(client: InferenceClient, images: ImageSource[], signal: AbortSignal): Promise<ImageSource> {
    const done = this.logger.time('Grid composition', { count: images.length });
    const buffers = await Promise.all(images.map((image) => loadImageBytes(image, signal)));
    const grid = await composeImageGrid(buffers);

    const dir = client.outputImagesDir ?? this.options.gridDir;
    const name = `grid-${images[images.length - 1].name}`;
    const localPath = path.join(dir, name);
    await fs.mkdir(dir, { recursive: true });
    await fs.writeFile(localPath, grid);
    done();
    return { kind: 'grid', name, localPath };
  }
}
