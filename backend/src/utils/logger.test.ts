import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { Logger, errorMessage } from './logger.js';

describe('Logger', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'inference-desk-log-'));
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'debug').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('writes info entries to console with scope prefix', () => {
    const logger = Logger.create().child('TextToImage');
    logger.info('Prompt queued', { promptId: 'p1' });
    expect(console.log).toHaveBeenCalledWith('[inference-desk] [TextToImage] Prompt queued promptId=p1');
  });

  it('routes warn and error to the matching console methods', () => {
    const logger = Logger.create();
    logger.warn('careful');
    logger.error('broken');
    expect(console.warn).toHaveBeenCalledWith('[inference-desk] [app] careful');
    expect(console.error).toHaveBeenCalledWith('[inference-desk] [app] broken');
  });

  it('drops entries below the threshold', () => {
    const logger = Logger.create({ level: 'info' });
    logger.debug('hidden');
    logger.trace('hidden too');
    expect(console.debug).not.toHaveBeenCalled();
    expect(logger.isEnabled('debug')).toBe(false);
    expect(logger.isEnabled('warn')).toBe(true);
  });

  it('emits debug entries when the threshold allows', () => {
    const logger = Logger.create({ level: 'debug' });
    logger.debug('Generation canceled');
    expect(console.debug).toHaveBeenCalledWith('[inference-desk] [app] Generation canceled');
  });

  it('appends JSONL and text lines when a log directory is set', () => {
    const logger = Logger.create({ logDir: tmpDir }).child('Extensions');
    logger.info('Refreshed', { available: 3 });

    const jsonl = fs.readFileSync(path.join(tmpDir, 'app.jsonl'), 'utf-8').trim();
    const entry = JSON.parse(jsonl);
    expect(entry.level).toBe('info');
    expect(entry.scope).toBe('Extensions');
    expect(entry.event).toBe('Refreshed');
    expect(entry.data).toEqual({ available: 3 });

    const text = fs.readFileSync(path.join(tmpDir, 'app.log'), 'utf-8');
    expect(text).toMatch(/\[INFO\] \[Extensions\] Refreshed available=3\n$/);
  });

  it('summarizes long strings and serializes objects', () => {
    const logger = Logger.create();
    logger.info('Payload', { body: 'x'.repeat(250), nodes: ['a', 'b'] });
    expect(console.log).toHaveBeenCalledWith('[inference-desk] [app] Payload body=[250 chars], nodes=["a","b"]');
  });
});

describe('errorMessage', () => {
  it('extracts messages from errors and stringifies the rest', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage(42)).toBe('42');
  });
});
