import { useState, useEffect, useRef, useCallback } from 'react';
import type { HealthStatus } from '../types';
import { apiFetch } from '../lib/apiClient';

export interface HealthState {
  status: HealthStatus['status'] | 'offline';
  inference: HealthStatus['inference'];
  address: string | null;
}

const POLL_INTERVAL = 30_000;
const OFFLINE: HealthState = { status: 'offline', inference: 'disconnected', address: null };

export function useHealthCheck(enabled: boolean) {
  const [health, setHealth] = useState<HealthState>(OFFLINE);
  const [loading, setLoading] = useState(true);
  const timerRef = useRef<ReturnType<typeof setInterval> | null>(null);

  const fetchHealth = useCallback(async () => {
    try {
      setHealth(await apiFetch<HealthStatus>('/api/health'));
    } catch {
      setHealth(OFFLINE);
    } finally {
      setLoading(false);
    }
  }, []);

  useEffect(() => {
    if (!enabled) return;

    void fetchHealth();
    timerRef.current = setInterval(() => void fetchHealth(), POLL_INTERVAL);

    return () => {
      if (timerRef.current) clearInterval(timerRef.current);
    };
  }, [enabled, fetchHealth]);

  return { health, loading, refresh: fetchHealth };
}
