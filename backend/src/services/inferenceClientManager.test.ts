import { describe, it, expect, beforeEach } from 'vitest';
import { InferenceClientManager } from './inferenceClientManager.js';
import { ClientNotConnectedError } from './comfy/errors.js';
import { Logger } from '../utils/logger.js';
import type { WSEvent } from '../models/events.js';
import { FakeInferenceClient } from '../tests/helpers/fakeInferenceClient.js';

let events: WSEvent[];
let created: FakeInferenceClient[];
let manager: InferenceClientManager;

beforeEach(() => {
  events = [];
  created = [];
  manager = new InferenceClientManager({
    defaultAddress: 'http://127.0.0.1:8188/',
    outputImagesDir: '/srv/comfy/output',
    send: (event) => events.push(event),
    logger: Logger.create({ level: 'error' }),
    createClient: (address, outputImagesDir) => {
      const client = new FakeInferenceClient(address, outputImagesDir);
      created.push(client);
      return client;
    },
  });
});

describe('InferenceClientManager', () => {
  it('throws ClientNotConnectedError when the client is read while disconnected', () => {
    expect(manager.isConnected).toBe(false);
    expect(() => manager.client).toThrow(ClientNotConnectedError);
  });

  it('connects to the default address and announces it', async () => {
    await manager.connect();

    expect(manager.isConnected).toBe(true);
    expect(manager.client.baseAddress).toBe('http://127.0.0.1:8188/');
    expect(manager.client.outputImagesDir).toBe('/srv/comfy/output');
    expect(events).toEqual([{ type: 'inference_connected', address: 'http://127.0.0.1:8188/' }]);
  });

  it('replaces an existing connection', async () => {
    await manager.connect();
    await manager.connect('http://10.0.0.5:8188/');

    expect(created[0].isConnected).toBe(false);
    expect(manager.address).toBe('http://10.0.0.5:8188/');
    expect(events.map((e) => e.type)).toEqual([
      'inference_connected',
      'inference_disconnected',
      'inference_connected',
    ]);
  });

  it('disconnects and closes the client', async () => {
    await manager.connect();
    manager.disconnect();
    manager.disconnect();

    expect(manager.isConnected).toBe(false);
    expect(created[0].isConnected).toBe(false);
    expect(created[0].closeHandlerCount).toBe(0);
    expect(events.map((e) => e.type)).toEqual(['inference_connected', 'inference_disconnected']);
  });

  it('forgets a client whose connection drops', async () => {
    await manager.connect();
    created[0].drop();

    expect(manager.isConnected).toBe(false);
    expect(manager.address).toBeNull();
    expect(events[events.length - 1]).toEqual({ type: 'inference_disconnected' });
  });
});
