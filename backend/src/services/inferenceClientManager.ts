/** Owns the single connection to the inference backend. */

import { ComfyClient, type InferenceClient } from './comfy/comfyClient.js';
import { ClientNotConnectedError } from './comfy/errors.js';
import type { Disposable } from './comfy/comfyTask.js';
import type { SendEvent } from '../models/events.js';
import { Logger } from '../utils/logger.js';

/** A client the manager can open and close. */
export interface ConnectableClient extends InferenceClient {
  readonly isConnected: boolean;
  connect(): Promise<void>;
  close(): void;
  onClose(handler: () => void): Disposable;
}

export type ClientFactory = (baseAddress: string, outputImagesDir: string | null) => ConnectableClient;

export interface InferenceClientManagerOptions {
  defaultAddress: string;
  outputImagesDir: string | null;
  send: SendEvent;
  logger?: Logger;
  createClient?: ClientFactory;
}

export class InferenceClientManager {
  private current: ConnectableClient | null = null;
  private closeSubscription: Disposable | null = null;
  private readonly createClient: ClientFactory;
  private readonly logger: Logger;

  constructor(private readonly options: InferenceClientManagerOptions) {
    this.logger = (options.logger ?? Logger.create()).child('InferenceClientManager');
    this.createClient = options.createClient ?? ((address, outputImagesDir) =>
      new ComfyClient(address, { outputImagesDir, logger: options.logger }));
  }

  get isConnected(): boolean {
    return this.current?.isConnected ?? false;
  }

  get address(): string | null {
    return this.current?.baseAddress ?? null;
  }

  /** The connected client. Throws ClientNotConnectedError while disconnected. */
  get client(): InferenceClient {
    if (!this.current || !this.current.isConnected) {
      throw new ClientNotConnectedError();
    }
    return this.current;
  }

  /** Connect, replacing any existing connection. */
  async connect(address = this.options.defaultAddress): Promise<void> {
    this.disconnect();

    const client = this.createClient(address, this.options.outputImagesDir);
    await client.connect();
    this.current = client;
    this.closeSubscription = client.onClose(() => {
      if (this.current !== client) return;
      this.logger.warn('Inference backend connection lost', { address: client.baseAddress });
      this.clear();
      this.options.send({ type: 'inference_disconnected' });
    });
    this.logger.info('Connected to inference backend', { address: client.baseAddress });
    this.options.send({ type: 'inference_connected', address: client.baseAddress });
  }

  disconnect(): void {
    const client = this.current;
    if (!client) return;
    this.clear();
    client.close();
    this.logger.info('Disconnected from inference backend', { address: client.baseAddress });
    this.options.send({ type: 'inference_disconnected' });
  }

  private clear(): void {
    this.closeSubscription?.dispose();
    this.closeSubscription = null;
    this.current = null;
  }
}
