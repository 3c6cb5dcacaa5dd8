import type {
  GenerationParameters,
  InferenceOptions,
  InferenceStatus,
  InstalledPackage,
  InstalledPackageExtension,
  ModificationResult,
  PackageExtension,
  PackageExtensions,
} from '../types';

/** Non-2xx answer from the backend; `detail` is the server's error text. */
export class ApiError extends Error {
  constructor(
    readonly status: number,
    readonly detail: string,
  ) {
    super(detail);
    this.name = 'ApiError';
  }
}

export function jsonHeaders(): HeadersInit {
  return { 'Content-Type': 'application/json' };
}

function detailOf(body: unknown, fallback: string): string {
  if (typeof body === 'object' && body !== null && 'detail' in body && typeof body.detail === 'string') {
    return body.detail;
  }
  return fallback;
}

/** fetch() against the backend API that parses JSON and throws ApiError on failure. */
export async function apiFetch<T>(url: string, init?: RequestInit): Promise<T> {
  const res = await fetch(url, {
    ...init,
    headers: {
      ...jsonHeaders(),
      ...(init?.headers ?? {}),
    },
  });
  const body: unknown = await res.json().catch(() => null);
  if (!res.ok) {
    throw new ApiError(res.status, detailOf(body, `Request failed: ${res.status}`));
  }
  // Response shapes are owned by the backend routes.
  return body as T;
}

function post<T>(url: string, body?: unknown, signal?: AbortSignal): Promise<T> {
  return apiFetch<T>(url, {
    method: 'POST',
    body: body === undefined ? undefined : JSON.stringify(body),
    signal,
  });
}

export const inferenceApi = {
  status: () => apiFetch<InferenceStatus>('/api/inference/status'),
  connect: (address?: string) =>
    post<{ connected: boolean; address: string | null }>('/api/inference/connect', address ? { address } : {}),
  disconnect: () => post<{ connected: boolean; address: string | null }>('/api/inference/disconnect'),
  options: () => apiFetch<InferenceOptions>('/api/inference/options'),
  generate: (parameters: GenerationParameters) =>
    post<{ generation_id: string }>('/api/inference/generate', { parameters }),
  cancel: (generationId: string) =>
    post<{ status: string }>(`/api/inference/generations/${encodeURIComponent(generationId)}/cancel`),
};

export const packagesApi = {
  list: () => apiFetch<InstalledPackage[]>('/api/packages'),
  extensions: (packageId: string) =>
    apiFetch<PackageExtensions>(`/api/packages/${encodeURIComponent(packageId)}/extensions`),
  install: (packageId: string, extensions: PackageExtension[], signal?: AbortSignal) =>
    post<ModificationResult>(`/api/packages/${encodeURIComponent(packageId)}/extensions/install`, { extensions }, signal),
  uninstall: (packageId: string, extensions: InstalledPackageExtension[], signal?: AbortSignal) =>
    post<ModificationResult>(`/api/packages/${encodeURIComponent(packageId)}/extensions/uninstall`, { extensions }, signal),
};

/** URL the browser can load an ImageSource from. */
export function imageUrl(source: { localPath?: string; url?: string }): string {
  if (source.localPath) return `/api/inference/images?path=${encodeURIComponent(source.localPath)}`;
  return source.url ?? '';
}
