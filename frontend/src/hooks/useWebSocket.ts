import { useEffect, useRef, useCallback, useState } from 'react';
import type { WSEvent } from '../types';
import { inferenceApi } from '../lib/apiClient';

interface UseWebSocketOptions {
  enabled?: boolean;
  onEvent: (event: WSEvent) => void;
}

export const MAX_RETRIES = 10;
const BASE_DELAY_MS = 1000;
const MAX_DELAY_MS = 30000;

const EVENT_TYPES = new Set<string>([
  'notification',
  'generation_started',
  'seed_changed',
  'generation_progress',
  'generation_preview',
  'generation_preview_cleared',
  'images_cleared',
  'generation_images',
  'api_error',
  'generation_finished',
  'generation_failed',
  'modification_started',
  'modification_progress',
  'modification_step_failed',
  'modification_completed',
  'inference_connected',
  'inference_disconnected',
]);

export function isWSEvent(value: unknown): value is WSEvent {
  return typeof value === 'object' && value !== null
    && 'type' in value && typeof value.type === 'string' && EVENT_TYPES.has(value.type);
}

export function useWebSocket({ enabled = true, onEvent }: UseWebSocketOptions) {
  const wsRef = useRef<WebSocket | null>(null);
  const reconnectTimer = useRef<ReturnType<typeof setTimeout> | null>(null);
  const retriesRef = useRef(0);
  const onEventRef = useRef(onEvent);
  const connectRef = useRef<() => void>();
  const [connected, setConnected] = useState(false);
  // Track whether this is a reconnection (not the first connect)
  const hasConnectedRef = useRef(false);

  useEffect(() => { onEventRef.current = onEvent; });

  const connect = useCallback(() => {
    if (!enabled) return;

    const protocol = window.location.protocol === 'https:' ? 'wss:' : 'ws:';
    const ws = new WebSocket(`${protocol}//${window.location.host}/ws/events`);

    ws.onopen = () => {
      const isReconnect = hasConnectedRef.current;
      retriesRef.current = 0;
      hasConnectedRef.current = true;
      setConnected(true);

      // Connection events sent while the socket was down are lost; resync from status
      if (isReconnect) {
        inferenceApi.status()
          .then((status) => {
            onEventRef.current(status.connected && status.address
              ? { type: 'inference_connected', address: status.address }
              : { type: 'inference_disconnected' });
          })
          .catch((err: unknown) => {
            console.warn('WebSocket: status resync failed', err);
          });
      }
    };

    ws.onmessage = (event: MessageEvent) => {
      let data: unknown;
      try {
        data = JSON.parse(String(event.data));
      } catch {
        console.warn('WebSocket: ignoring malformed message');
        return;
      }
      if (isWSEvent(data)) onEventRef.current(data);
    };

    ws.onerror = () => {
      // Error details are intentionally hidden by browsers; onclose handles reconnect
    };

    ws.onclose = () => {
      wsRef.current = null;
      setConnected(false);
      if (retriesRef.current >= MAX_RETRIES) {
        console.warn(`WebSocket: gave up after ${MAX_RETRIES} retries`);
        onEventRef.current({
          type: 'error',
          message: 'WebSocket connection failed after max retries',
          recoverable: false,
        });
        return;
      }
      const delay = Math.min(BASE_DELAY_MS * 2 ** retriesRef.current, MAX_DELAY_MS);
      retriesRef.current++;
      reconnectTimer.current = setTimeout(() => connectRef.current?.(), delay);
    };

    wsRef.current = ws;
  }, [enabled]);

  useEffect(() => { connectRef.current = connect; });

  useEffect(() => {
    retriesRef.current = 0;
    hasConnectedRef.current = false;
    connect();
    return () => {
      if (reconnectTimer.current) clearTimeout(reconnectTimer.current);
      if (wsRef.current) {
        wsRef.current.onclose = null;
        wsRef.current.close();
      }
      setConnected(false);
    };
  }, [connect]);

  return { connected };
}
