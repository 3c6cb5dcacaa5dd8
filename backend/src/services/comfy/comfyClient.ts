/** HTTP + WebSocket client for a ComfyUI-compatible node-graph inference backend. */

import { randomUUID } from 'node:crypto';
import WebSocket, { type RawData } from 'ws';
import { z } from 'zod';
import type { ComfyImage, NodeGraph, PreviewImage, PreviewImageFormat } from '../../models/comfy.js';
import { validateNodeGraph } from '../../utils/dag.js';
import { REQUEST_TIMEOUT_MS } from '../../utils/constants.js';
import { withTimeout } from '../../utils/withTimeout.js';
import { Logger, errorMessage } from '../../utils/logger.js';
import { ComfyTask, type Disposable } from './comfyTask.js';
import { ComfyApiError, ComfyExecutionError } from './errors.js';
import { withTrailingSlash } from './comfyImage.js';

export type PreviewImageHandler = (image: PreviewImage) => void;

/** What the generation flow needs from a connected inference backend. */
export interface InferenceClient {
  readonly baseAddress: string;
  /** Local directory the backend writes outputs to, when it runs on this machine. */
  readonly outputImagesDir: string | null;
  queuePrompt(graph: NodeGraph, signal?: AbortSignal): Promise<ComfyTask>;
  interruptPrompt(signal?: AbortSignal): Promise<void>;
  getImagesForExecutedPrompt(promptId: string, signal?: AbortSignal): Promise<Record<string, ComfyImage[]>>;
  getNodeOptions(nodeClass: string, inputName: string, signal?: AbortSignal): Promise<string[]>;
  onPreviewImage(handler: PreviewImageHandler): Disposable;
}

export interface ComfyClientOptions {
  outputImagesDir?: string | null;
  clientId?: string;
  logger?: Logger;
  requestTimeoutMs?: number;
}

const QueuePromptResponseSchema = z.object({
  prompt_id: z.string(),
  number: z.number().optional(),
  node_errors: z.record(z.unknown()).optional(),
});

const ComfyImageSchema = z.object({
  filename: z.string(),
  subfolder: z.string().default(''),
  type: z.string().default('output'),
});

const HistorySchema = z.record(
  z.object({
    outputs: z.record(z.object({ images: z.array(ComfyImageSchema).optional() }).passthrough()).default({}),
  }).passthrough(),
);

const ObjectInfoSchema = z.record(
  z.object({
    input: z.object({
      required: z.record(z.array(z.unknown())).optional(),
      optional: z.record(z.array(z.unknown())).optional(),
    }).passthrough(),
  }).passthrough(),
);

const SocketMessageSchema = z.object({
  type: z.string(),
  data: z.record(z.unknown()).default({}),
});

/** Binary socket frame type carrying a preview image. */
const PREVIEW_IMAGE_EVENT = 1;
const PREVIEW_FORMATS: Record<number, PreviewImageFormat> = { 1: 'jpeg', 2: 'png' };
/** Prompts that finished before their queue response arrived. */
const MAX_EARLY_FINISHED = 32;

export class ComfyClient implements InferenceClient {
  readonly baseAddress: string;
  readonly outputImagesDir: string | null;
  readonly clientId: string;

  private socket: WebSocket | null = null;
  private readonly tasks = new Map<string, ComfyTask>();
  private readonly earlyFinished = new Map<string, Error | null>();
  private readonly previewHandlers = new Set<PreviewImageHandler>();
  private readonly closeHandlers = new Set<() => void>();
  private currentPromptId: string | null = null;
  private runningNode: string | null = null;
  private readonly logger: Logger;
  private readonly requestTimeoutMs: number;

  constructor(baseAddress: string, options: ComfyClientOptions = {}) {
    this.baseAddress = withTrailingSlash(baseAddress);
    this.outputImagesDir = options.outputImagesDir ?? null;
    this.clientId = options.clientId ?? randomUUID();
    this.logger = (options.logger ?? Logger.create()).child('ComfyClient');
    this.requestTimeoutMs = options.requestTimeoutMs ?? REQUEST_TIMEOUT_MS;
  }

  get isConnected(): boolean {
    return this.socket?.readyState === WebSocket.OPEN;
  }

  /** Open the event socket. Resolves once it is open. */
  connect(): Promise<void> {
    const url = new URL(`ws?clientId=${encodeURIComponent(this.clientId)}`, this.baseAddress);
    url.protocol = url.protocol === 'https:' ? 'wss:' : 'ws:';

    return new Promise<void>((resolve, reject) => {
      const socket = new WebSocket(url);
      let opened = false;

      socket.on('open', () => {
        opened = true;
        this.socket = socket;
        this.logger.info('Connected', { address: this.baseAddress });
        resolve();
      });
      socket.on('message', (data, isBinary) => this.handleSocketMessage(data, isBinary));
      socket.on('error', (err) => {
        if (!opened) {
          reject(err);
          return;
        }
        this.logger.warn('Socket error', { error: err.message });
      });
      socket.on('close', () => {
        if (this.socket === socket) this.socket = null;
        if (!opened) return;
        this.logger.info('Disconnected', { address: this.baseAddress });
        this.failPendingTasks('Connection to the inference backend closed');
        for (const handler of [...this.closeHandlers]) handler();
      });
    });
  }

  close(): void {
    const socket = this.socket;
    this.socket = null;
    socket?.close();
    this.failPendingTasks('Inference client closed');
  }

  onClose(handler: () => void): Disposable {
    this.closeHandlers.add(handler);
    return { dispose: () => { this.closeHandlers.delete(handler); } };
  }

  onPreviewImage(handler: PreviewImageHandler): Disposable {
    this.previewHandlers.add(handler);
    return { dispose: () => { this.previewHandlers.delete(handler); } };
  }

  get previewHandlerCount(): number {
    return this.previewHandlers.size;
  }

  async queuePrompt(graph: NodeGraph, signal?: AbortSignal): Promise<ComfyTask> {
    validateNodeGraph(graph);

    const body = await this.request('prompt', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ prompt: graph, client_id: this.clientId }),
    }, signal);
    const response = QueuePromptResponseSchema.parse(JSON.parse(body));

    const task = new ComfyTask(response.prompt_id, (t) => this.tasks.delete(t.id));
    this.tasks.set(task.id, task);
    this.logger.debug('Prompt queued', { promptId: task.id, number: response.number });

    const early = this.earlyFinished.get(task.id);
    if (early !== undefined) {
      this.earlyFinished.delete(task.id);
      if (early) task.fail(early);
      else task.complete();
    }
    return task;
  }

  async interruptPrompt(signal?: AbortSignal): Promise<void> {
    await this.request('interrupt', { method: 'POST' }, signal);
  }

  async getImagesForExecutedPrompt(promptId: string, signal?: AbortSignal): Promise<Record<string, ComfyImage[]>> {
    const body = await this.request(`history/${encodeURIComponent(promptId)}`, { method: 'GET' }, signal);
    const history = HistorySchema.parse(JSON.parse(body));
    const entry = history[promptId];
    const images: Record<string, ComfyImage[]> = {};
    if (!entry) return images;
    for (const [nodeName, output] of Object.entries(entry.outputs)) {
      if (output.images) images[nodeName] = output.images;
    }
    return images;
  }

  async getNodeOptions(nodeClass: string, inputName: string, signal?: AbortSignal): Promise<string[]> {
    const body = await this.request(`object_info/${encodeURIComponent(nodeClass)}`, { method: 'GET' }, signal);
    const info = ObjectInfoSchema.parse(JSON.parse(body))[nodeClass];
    const spec = info?.input.required?.[inputName] ?? info?.input.optional?.[inputName];
    const values = spec?.[0];
    if (!Array.isArray(values)) return [];
    return values.filter((v): v is string => typeof v === 'string');
  }

  /** Route one socket frame to the task or preview handlers it concerns. */
  handleSocketMessage(data: RawData, isBinary: boolean): void {
    if (isBinary) {
      this.handleBinaryMessage(toBuffer(data));
      return;
    }

    let parsed: z.infer<typeof SocketMessageSchema>;
    try {
      parsed = SocketMessageSchema.parse(JSON.parse(toBuffer(data).toString('utf-8')));
    } catch (err) {
      this.logger.debug('Ignoring malformed socket message', { error: errorMessage(err) });
      return;
    }

    const { type, data: payload } = parsed;
    const promptId = typeof payload.prompt_id === 'string' ? payload.prompt_id : this.currentPromptId;

    switch (type) {
      case 'execution_start':
        this.currentPromptId = promptId;
        this.runningNode = null;
        break;
      case 'executing': {
        const node = typeof payload.node === 'string' ? payload.node : null;
        if (promptId) this.currentPromptId = promptId;
        this.runningNode = node;
        if (node === null && promptId) this.finishPrompt(promptId, null);
        break;
      }
      case 'execution_success':
        if (promptId) this.finishPrompt(promptId, null);
        break;
      case 'progress': {
        if (!promptId) break;
        const task = this.tasks.get(promptId);
        if (!task) break;
        task.reportProgress({
          value: typeof payload.value === 'number' ? payload.value : 0,
          maximum: typeof payload.max === 'number' ? payload.max : 0,
          runningNode: typeof payload.node === 'string' ? payload.node : this.runningNode,
        });
        break;
      }
      case 'execution_error': {
        if (!promptId) break;
        const nodeName = typeof payload.node_id === 'string' ? payload.node_id : null;
        const message = typeof payload.exception_message === 'string'
          ? payload.exception_message
          : 'Prompt execution failed';
        this.finishPrompt(promptId, new ComfyExecutionError(promptId, message, nodeName));
        break;
      }
      case 'execution_interrupted':
        if (promptId) this.finishPrompt(promptId, new ComfyExecutionError(promptId, 'Prompt execution was interrupted'));
        break;
      default:
        break;
    }
  }

  private handleBinaryMessage(buffer: Buffer): void {
    if (buffer.length < 8) return;
    const eventType = buffer.readUInt32BE(0);
    if (eventType !== PREVIEW_IMAGE_EVENT) return;
    const format = PREVIEW_FORMATS[buffer.readUInt32BE(4)];
    if (!format) return;
    const image: PreviewImage = { format, bytes: buffer.subarray(8) };
    for (const handler of [...this.previewHandlers]) {
      handler(image);
    }
  }

  private finishPrompt(promptId: string, error: Error | null): void {
    if (this.currentPromptId === promptId) {
      this.currentPromptId = null;
      this.runningNode = null;
    }
    const task = this.tasks.get(promptId);
    if (!task) {
      this.earlyFinished.set(promptId, error);
      if (this.earlyFinished.size > MAX_EARLY_FINISHED) {
        const oldest = this.earlyFinished.keys().next().value;
        if (oldest !== undefined) this.earlyFinished.delete(oldest);
      }
      return;
    }
    if (error) task.fail(error);
    else task.complete();
  }

  private failPendingTasks(message: string): void {
    for (const task of this.tasks.values()) {
      task.fail(new ComfyExecutionError(task.id, message));
    }
  }

  private async request(path: string, init: RequestInit, signal?: AbortSignal): Promise<string> {
    const controller = new AbortController();
    const onAbort = () => controller.abort(signal?.reason);
    if (signal?.aborted) controller.abort(signal.reason);
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const url = new URL(path, this.baseAddress);
      const response = await withTimeout(
        fetch(url, { ...init, signal: controller.signal }),
        this.requestTimeoutMs,
        { abortController: controller, message: `Request to ${url.pathname} timed out` },
      );
      const text = await response.text();
      if (!response.ok) {
        throw new ComfyApiError(response.status, text);
      }
      return text;
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }
  }
}

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}
