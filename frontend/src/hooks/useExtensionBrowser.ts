import { useState, useCallback, useEffect, useSyncExternalStore } from 'react';
import type { InstalledPackage, ModificationResult, WSEvent } from '../types';
import { packagesApi } from '../lib/apiClient';
import { ExtensionBrowserModel, type ExtensionApi } from '../lib/extensionBrowser';

export interface ModificationProgress {
  runnerId: string;
  totalSteps: number;
  stepIndex: number;
  title: string;
  message: string;
  /** 0..1, or null while indeterminate. */
  value: number | null;
  errors: string[];
  done: boolean;
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export type ExtensionBrowserState = ReturnType<typeof useExtensionBrowser>;

export function useExtensionBrowser(api?: ExtensionApi) {
  const [model] = useState(() => new ExtensionBrowserModel(api));
  const subscribe = useCallback((listener: () => void) => model.subscribe(listener), [model]);
  useSyncExternalStore(subscribe, () => model.snapshot);

  const [packages, setPackages] = useState<InstalledPackage[]>([]);
  const [error, setError] = useState<string | null>(null);
  const [lastResult, setLastResult] = useState<ModificationResult | null>(null);
  const [modification, setModification] = useState<ModificationProgress | null>(null);

  const refresh = useCallback(async () => {
    setError(null);
    try {
      await model.refresh();
    } catch (err) {
      setError(messageOf(err));
    }
  }, [model]);

  const selectPackage = useCallback(async (pkg: InstalledPackage | null) => {
    model.setPackage(pkg);
    await refresh();
  }, [model, refresh]);

  useEffect(() => {
    let cancelled = false;
    packagesApi.list()
      .then((list) => {
        if (cancelled) return;
        setPackages(list);
        if (!model.package) {
          void selectPackage(list.find((p) => p.supportsExtensions) ?? null);
        }
      })
      .catch((err: unknown) => {
        if (!cancelled) setError(messageOf(err));
      });
    return () => { cancelled = true; };
  }, [model, selectPackage]);

  const runModification = useCallback(async (run: () => Promise<ModificationResult | null>) => {
    setError(null);
    try {
      const result = await run();
      if (result) setLastResult(result);
    } catch (err) {
      setError(messageOf(err));
    }
  }, []);

  const installSelected = useCallback(() => runModification(() => model.installSelected()), [model, runModification]);
  const uninstallSelected = useCallback(() => runModification(() => model.uninstallSelected()), [model, runModification]);

  const handleEvent = useCallback((event: WSEvent) => {
    switch (event.type) {
      case 'modification_started':
        setModification({
          runnerId: event.runner_id,
          totalSteps: event.total_steps,
          stepIndex: 0,
          title: '',
          message: '',
          value: null,
          errors: [],
          done: false,
        });
        break;
      case 'modification_progress':
        setModification(prev => prev && prev.runnerId === event.runner_id
          ? { ...prev, stepIndex: event.step_index, title: event.title, message: event.message, value: event.progress }
          : prev);
        break;
      case 'modification_step_failed':
        setModification(prev => prev && prev.runnerId === event.runner_id
          ? { ...prev, errors: [...prev.errors, `${event.title}: ${event.error}`] }
          : prev);
        break;
      case 'modification_completed':
        setModification(prev => prev && prev.runnerId === event.runner_id
          ? { ...prev, done: true, value: 1 }
          : prev);
        break;
      default:
        break;
    }
  }, []);

  return {
    model,
    packages,
    selectedPackage: model.package,
    isLoading: model.isLoading,
    isModifying: model.isModifying,
    available: model.availableItems,
    installed: model.installedItems,
    error,
    lastResult,
    modification,
    selectPackage,
    refresh,
    installSelected,
    uninstallSelected,
    clearSelection: () => model.clearSelection(),
    handleEvent,
  };
}
