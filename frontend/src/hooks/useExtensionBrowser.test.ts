import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { renderHook, waitFor, act } from '@testing-library/react';
import { useExtensionBrowser } from './useExtensionBrowser';
import type { ExtensionApi } from '../lib/extensionBrowser';
import type { InstalledPackage, PackageExtension } from '../types';

const packages: InstalledPackage[] = [
  { id: 'webui', displayName: 'WebUI', packageName: 'stable-diffusion-webui', libraryPath: '/opt/webui', supportsExtensions: false },
  { id: 'comfy', displayName: 'ComfyUI', packageName: 'comfyui', libraryPath: '/opt/comfy', supportsExtensions: true },
];

const impact: PackageExtension = {
  author: 'someone',
  title: 'Impact Pack',
  reference: 'https://github.com/someone/Impact-Pack',
  files: ['https://github.com/someone/Impact-Pack'],
  installType: 'git-clone',
};

let api: { [K in keyof ExtensionApi]: ReturnType<typeof vi.fn> };

beforeEach(() => {
  vi.stubGlobal('fetch', vi.fn().mockResolvedValue({ ok: true, status: 200, json: () => Promise.resolve(packages) }));
  api = {
    getExtensions: vi.fn().mockResolvedValue({ available: [impact], installed: [] }),
    install: vi.fn().mockResolvedValue({ runner_id: 'r1', failed: false, completed_steps: 1, errors: [] }),
    uninstall: vi.fn(),
  };
});

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('useExtensionBrowser', () => {
  it('selects the first package with extension support and loads it', async () => {
    const { result } = renderHook(() => useExtensionBrowser(api));

    await waitFor(() => expect(result.current.available.items).toHaveLength(1));
    expect(result.current.packages).toEqual(packages);
    expect(result.current.selectedPackage?.id).toBe('comfy');
    expect(api.getExtensions).toHaveBeenCalledWith('comfy');
  });

  it('re-renders when an item is selected', async () => {
    const { result } = renderHook(() => useExtensionBrowser(api));
    await waitFor(() => expect(result.current.available.items).toHaveLength(1));

    act(() => { result.current.available.items[0].isSelected = true; });

    expect(result.current.available.selected).toHaveLength(1);
  });

  it('reports unsupported packages as an error', async () => {
    const { result } = renderHook(() => useExtensionBrowser(api));
    await waitFor(() => expect(result.current.selectedPackage?.id).toBe('comfy'));

    await act(async () => {
      await result.current.selectPackage(packages[0]);
    });

    expect(result.current.error).toBe('The package WebUI does not support extensions.');
  });

  it('installs the selection and keeps the result', async () => {
    const { result } = renderHook(() => useExtensionBrowser(api));
    await waitFor(() => expect(result.current.available.items).toHaveLength(1));
    act(() => { result.current.available.items[0].isSelected = true; });

    await act(async () => {
      await result.current.installSelected();
    });

    expect(api.install).toHaveBeenCalledWith('comfy', [impact]);
    expect(result.current.lastResult).toEqual({ runner_id: 'r1', failed: false, completed_steps: 1, errors: [] });
    expect(result.current.available.selected).toEqual([]);
  });

  it('tracks step runner events', async () => {
    const { result } = renderHook(() => useExtensionBrowser(api));
    await waitFor(() => expect(result.current.selectedPackage).not.toBeNull());

    act(() => result.current.handleEvent({ type: 'modification_started', runner_id: 'r1', package_id: 'comfy', total_steps: 2 }));
    act(() => result.current.handleEvent({
      type: 'modification_progress',
      runner_id: 'r1',
      step_index: 0,
      title: 'Installing Impact Pack',
      message: 'Cloning',
      progress: null,
    }));
    act(() => result.current.handleEvent({
      type: 'modification_step_failed',
      runner_id: 'r1',
      step_index: 0,
      title: 'Installing Impact Pack',
      error: 'Extension directory already exists: Impact-Pack',
    }));
    act(() => result.current.handleEvent({ type: 'modification_completed', runner_id: 'r1', failed: true, completed_steps: 0, total_steps: 2 }));

    expect(result.current.modification).toEqual({
      runnerId: 'r1',
      totalSteps: 2,
      stepIndex: 0,
      title: 'Installing Impact Pack',
      message: 'Cloning',
      value: 1,
      errors: ['Installing Impact Pack: Extension directory already exists: Impact-Pack'],
      done: true,
    });
  });

  it('ignores progress of other runners', async () => {
    const { result } = renderHook(() => useExtensionBrowser(api));
    await waitFor(() => expect(result.current.selectedPackage).not.toBeNull());

    act(() => result.current.handleEvent({ type: 'modification_started', runner_id: 'r1', package_id: 'comfy', total_steps: 1 }));
    act(() => result.current.handleEvent({ type: 'modification_completed', runner_id: 'r2', failed: false, completed_steps: 1, total_steps: 1 }));

    expect(result.current.modification?.done).toBe(false);
  });
});
