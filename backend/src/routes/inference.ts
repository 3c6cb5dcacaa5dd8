/** Inference route handlers: /api/inference/* */

import { Router } from 'express';
import fs from 'node:fs';
import { randomUUID } from 'node:crypto';
import type { InferenceClientManager } from '../services/inferenceClientManager.js';
import type { TextToImageRunner } from '../services/textToImageRunner.js';
import { GenerationBusyError, type GenerationEntry, type GenerationStore } from '../services/generationStore.js';
import { ComfyApiError } from '../services/comfy/errors.js';
import type { SendEvent } from '../models/events.js';
import { ConnectRequestSchema, GenerateRequestSchema, validationFailure } from '../utils/requestSchemas.js';
import { validatePathWithin } from '../utils/pathValidator.js';
import { Logger, errorMessage } from '../utils/logger.js';

interface InferenceRouterDeps {
  clients: InferenceClientManager;
  generations: GenerationStore;
  runner: TextToImageRunner;
  send: SendEvent;
  /** Directories images may be served from. */
  imageRoots: () => string[];
  logger?: Logger;
}

export function createInferenceRouter({ clients, generations, runner, send, imageRoots, logger: baseLogger }: InferenceRouterDeps): Router {
  const router = Router();
  const logger = (baseLogger ?? Logger.create()).child('routes/inference');

  router.post('/connect', async (req, res) => {
    const parsed = ConnectRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json(validationFailure('Invalid connect request', parsed.error));
      return;
    }
    try {
      await clients.connect(parsed.data.address);
    } catch (err) {
      logger.warn('Connect failed', { address: parsed.data.address, error: errorMessage(err) });
      res.status(502).json({ detail: `Could not connect to the inference backend: ${errorMessage(err)}` });
      return;
    }
    res.json({ connected: true, address: clients.address });
  });

  router.post('/disconnect', (_req, res) => {
    generations.active?.controller.abort();
    clients.disconnect();
    res.json({ connected: false, address: null });
  });

  router.get('/status', (_req, res) => {
    res.json({
      connected: clients.isConnected,
      address: clients.address,
      generation_id: generations.active?.id ?? null,
    });
  });

  router.get('/options', async (_req, res) => {
    if (!clients.isConnected) {
      res.status(409).json({ detail: 'Inference client is not connected' });
      return;
    }
    const client = clients.client;
    try {
      const [models, samplers, upscaleMethods] = await Promise.all([
        client.getNodeOptions('CheckpointLoaderSimple', 'ckpt_name'),
        client.getNodeOptions('KSampler', 'sampler_name'),
        client.getNodeOptions('LatentUpscale', 'upscale_method'),
      ]);
      res.json({ models, samplers, upscaleMethods });
    } catch (err) {
      if (!(err instanceof ComfyApiError)) throw err;
      res.status(502).json({ detail: err.message });
    }
  });

  router.post('/generate', (req, res) => {
    const parsed = GenerateRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json(validationFailure('Invalid generation parameters', parsed.error));
      return;
    }

    const generationId = randomUUID();
    let entry: GenerationEntry;
    try {
      entry = generations.start(generationId);
    } catch (err) {
      if (!(err instanceof GenerationBusyError)) throw err;
      res.status(409).json({ detail: err.message, generation_id: err.runningId });
      return;
    }

    send({ type: 'generation_started', generation_id: generationId });
    void runner.generate(generationId, parsed.data.parameters, entry.controller.signal)
      .then((status) => {
        generations.finish(generationId, status);
        send({ type: 'generation_finished', generation_id: generationId, status });
      })
      .catch((err: unknown) => {
        const message = errorMessage(err);
        logger.error('Generation failed', { generationId, error: message });
        generations.finish(generationId, 'failed', message);
        send({ type: 'generation_failed', generation_id: generationId, message });
      });

    res.json({ generation_id: generationId });
  });

  router.get('/generations/:id', (req, res) => {
    const entry = generations.get(req.params.id);
    if (!entry) { res.status(404).json({ detail: 'Generation not found' }); return; }
    res.json({ generation_id: entry.id, status: entry.status, error: entry.error });
  });

  router.post('/generations/:id/cancel', (req, res) => {
    const entry = generations.get(req.params.id);
    if (!entry) { res.status(404).json({ detail: 'Generation not found' }); return; }
    if (!generations.cancel(entry.id)) {
      res.status(409).json({ detail: 'Generation is not running' });
      return;
    }
    res.json({ status: 'canceling' });
  });

  router.get('/images', (req, res) => {
    const rawPath = typeof req.query.path === 'string' ? req.query.path : '';
    const validation = validatePathWithin(rawPath, imageRoots());
    if (!validation.valid) {
      res.status(400).json({ detail: validation.reason });
      return;
    }
    if (!fs.existsSync(validation.resolved) || !fs.statSync(validation.resolved).isFile()) {
      res.status(404).json({ detail: 'Image not found' });
      return;
    }
    res.sendFile(validation.resolved, { dotfiles: 'allow' });
  });

  return router;
}
