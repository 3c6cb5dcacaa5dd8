import { useState, useCallback, useEffect } from 'react';
import type { InferenceOptions, WSEvent } from '../types';
import { inferenceApi } from '../lib/apiClient';

export const EMPTY_OPTIONS: InferenceOptions = { models: [], samplers: [], upscaleMethods: [] };

/** Connection to the inference backend and the choices it offers. */
export function useInferenceConnection() {
  const [connected, setConnected] = useState(false);
  const [address, setAddress] = useState<string | null>(null);
  const [options, setOptions] = useState<InferenceOptions>(EMPTY_OPTIONS);
  const [connecting, setConnecting] = useState(false);
  const [error, setError] = useState<string | null>(null);

  const loadOptions = useCallback(async () => {
    try {
      setOptions(await inferenceApi.options());
    } catch (err) {
      console.warn('Loading inference options failed', err);
      setOptions(EMPTY_OPTIONS);
    }
  }, []);

  const applyConnected = useCallback((value: boolean, addr: string | null) => {
    setConnected(value);
    setAddress(addr);
    if (value) {
      void loadOptions();
    } else {
      setOptions(EMPTY_OPTIONS);
    }
  }, [loadOptions]);

  useEffect(() => {
    let cancelled = false;
    inferenceApi.status()
      .then((status) => {
        if (!cancelled) applyConnected(status.connected, status.address);
      })
      .catch((err: unknown) => {
        console.warn('Loading inference status failed', err);
      });
    return () => { cancelled = true; };
  }, [applyConnected]);

  const handleEvent = useCallback((event: WSEvent) => {
    if (event.type === 'inference_connected') applyConnected(true, event.address);
    else if (event.type === 'inference_disconnected') applyConnected(false, null);
  }, [applyConnected]);

  const connect = useCallback(async (target?: string) => {
    setConnecting(true);
    setError(null);
    try {
      const res = await inferenceApi.connect(target);
      applyConnected(res.connected, res.address);
    } catch (err) {
      setError(err instanceof Error ? err.message : String(err));
    } finally {
      setConnecting(false);
    }
  }, [applyConnected]);

  const disconnect = useCallback(async () => {
    setError(null);
    try {
      await inferenceApi.disconnect();
      applyConnected(false, null);
    } catch (err) {
      setError(err instanceof Error ? err.message : String(err));
    }
  }, [applyConnected]);

  return { connected, address, options, connecting, error, connect, disconnect, handleEvent };
}
