/** Custom node management for ComfyUI packages. */

import fs from 'node:fs/promises';
import { existsSync, type Dirent } from 'node:fs';
import path from 'node:path';
import { simpleGit } from 'simple-git';
import { z } from 'zod';
import type { InstalledPackage } from '../../models/package.js';
import {
  packageExtensionKey,
  type ExtensionInstallType,
  type InstalledExtensionVersion,
  type InstalledPackageExtension,
  type PackageExtension,
} from '../../models/extension.js';
import type { ExtensionManager, ProgressReporter } from './extensionManager.js';
import { NotSupportedError } from './errors.js';
import { COMFY_EXTENSION_MANIFEST_URL, COMFY_EXTENSIONS_DIR, MANIFEST_TIMEOUT_MS } from '../../utils/constants.js';
import { isInside } from '../../utils/pathValidator.js';
import { withTimeout } from '../../utils/withTimeout.js';
import { Logger, errorMessage } from '../../utils/logger.js';

const ManifestSchema = z.object({
  custom_nodes: z.array(z.unknown()),
});

const CustomNodeSchema = z.object({
  author: z.string(),
  title: z.string(),
  reference: z.string(),
  files: z.array(z.string()).min(1),
  install_type: z.string(),
  description: z.string().optional(),
  pip: z.array(z.string()).optional(),
});

const INSTALL_TYPES: readonly ExtensionInstallType[] = ['git-clone', 'copy'];

export interface ComfyExtensionManagerOptions {
  manifestUrls?: string[];
  logger?: Logger;
}

export class ComfyExtensionManager implements ExtensionManager {
  private readonly manifestUrls: string[];
  private readonly logger: Logger;

  constructor(options: ComfyExtensionManagerOptions = {}) {
    this.manifestUrls = options.manifestUrls ?? [COMFY_EXTENSION_MANIFEST_URL];
    this.logger = (options.logger ?? Logger.create()).child('ComfyExtensions');
  }

  getManifests(_pkg: InstalledPackage): string[] {
    return [...this.manifestUrls];
  }

  async getManifestExtensions(manifestUrls: readonly string[], signal?: AbortSignal): Promise<PackageExtension[]> {
    const byKey = new Map<string, PackageExtension>();
    for (const url of manifestUrls) {
      signal?.throwIfAborted();
      let entries: unknown[];
      try {
        entries = await this.fetchManifest(url, signal);
      } catch (err) {
        if (signal?.aborted) throw err;
        this.logger.warn('Failed to fetch extension manifest', { url, error: errorMessage(err) });
        continue;
      }

      let skipped = 0;
      for (const raw of entries) {
        const parsed = CustomNodeSchema.safeParse(raw);
        if (!parsed.success) {
          skipped++;
          continue;
        }
        const extension = toPackageExtension(parsed.data);
        const key = packageExtensionKey(extension);
        if (!byKey.has(key)) byKey.set(key, extension);
      }
      if (skipped > 0) this.logger.debug('Skipped invalid manifest entries', { url, skipped });
    }
    return [...byKey.values()];
  }

  async getInstalledExtensions(pkg: InstalledPackage, signal?: AbortSignal): Promise<InstalledPackageExtension[]> {
    const dir = extensionsDir(pkg);
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (err) {
      if (isNodeError(err) && err.code === 'ENOENT') return [];
      throw err;
    }

    const installed: InstalledPackageExtension[] = [];
    for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
      signal?.throwIfAborted();
      if (entry.name.startsWith('.') || entry.name === '__pycache__') continue;
      const fullPath = path.join(dir, entry.name);

      if (entry.isDirectory()) {
        installed.push(await this.readInstalledDirectory(fullPath));
      } else if (entry.isFile() && entry.name.endsWith('.py')) {
        installed.push({ paths: [fullPath] });
      }
    }
    return installed;
  }

  async installExtension(
    pkg: InstalledPackage,
    extension: PackageExtension,
    report: ProgressReporter,
    signal?: AbortSignal,
  ): Promise<void> {
    const dir = extensionsDir(pkg);
    await fs.mkdir(dir, { recursive: true });

    switch (extension.installType) {
      case 'git-clone': {
        const repoUrl = extension.files[0];
        const target = path.join(dir, repositoryName(repoUrl));
        if (existsSync(target)) {
          throw new Error(`Extension directory already exists: ${path.basename(target)}`);
        }
        report({ message: `Cloning ${repoUrl}`, value: null });
        await simpleGit({ baseDir: dir, abort: signal }).clone(repoUrl, target);
        this.logger.info('Extension cloned', { title: extension.title, target });
        break;
      }
      case 'copy': {
        for (const [index, fileUrl] of extension.files.entries()) {
          const target = path.join(dir, path.posix.basename(new URL(fileUrl).pathname));
          report({ message: `Downloading ${path.basename(target)}`, value: index / extension.files.length });
          await downloadFile(fileUrl, target, signal);
        }
        this.logger.info('Extension files copied', { title: extension.title, count: extension.files.length });
        break;
      }
      default:
        throw new NotSupportedError(`Install type of ${extension.title} is not supported`);
    }
    report({ message: `Installed ${extension.title}`, value: 1 });
  }

  async uninstallExtension(
    pkg: InstalledPackage,
    installed: InstalledPackageExtension,
    report: ProgressReporter,
    signal?: AbortSignal,
  ): Promise<void> {
    const dir = path.resolve(extensionsDir(pkg));
    const targets = installed.paths.map((p) => path.resolve(dir, p));
    const outside = targets.find((t) => t === dir || !isInside(t, dir));
    if (outside) {
      throw new Error(`Refusing to remove path outside ${COMFY_EXTENSIONS_DIR}: ${outside}`);
    }
    if (targets.length === 0) {
      throw new Error('Installed extension has no paths to remove');
    }

    for (const target of targets) {
      signal?.throwIfAborted();
      report({ message: `Removing ${path.basename(target)}`, value: null });
      await fs.rm(target, { recursive: true, force: true });
    }
    this.logger.info('Extension removed', { paths: targets });
    report({ message: `Removed ${path.basename(targets[0])}`, value: 1 });
  }

  private async fetchManifest(url: string, signal?: AbortSignal): Promise<unknown[]> {
    const controller = new AbortController();
    const onAbort = () => controller.abort(signal?.reason);
    signal?.addEventListener('abort', onAbort, { once: true });
    try {
      const res = await withTimeout(fetch(url, { signal: controller.signal }), MANIFEST_TIMEOUT_MS, {
        abortController: controller,
        message: `Fetching ${url} timed out`,
      });
      if (!res.ok) throw new Error(`HTTP ${res.status}`);
      return ManifestSchema.parse(await res.json()).custom_nodes;
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }
  }

  private async readInstalledDirectory(fullPath: string): Promise<InstalledPackageExtension> {
    if (!existsSync(path.join(fullPath, '.git'))) {
      return { paths: [fullPath] };
    }
    try {
      const git = simpleGit(fullPath);
      const remotes = await git.getRemotes(true);
      const origin = remotes.find((r) => r.name === 'origin') ?? remotes[0];
      const version: InstalledExtensionVersion = {
        branch: (await git.revparse(['--abbrev-ref', 'HEAD'])).trim(),
        commitSha: (await git.revparse(['HEAD'])).trim(),
      };
      return {
        paths: [fullPath],
        ...(origin?.refs.fetch ? { gitRepositoryUrl: origin.refs.fetch } : {}),
        version,
      };
    } catch (err) {
      this.logger.debug('Could not read extension repository', { path: fullPath, error: errorMessage(err) });
      return { paths: [fullPath] };
    }
  }
}

function extensionsDir(pkg: InstalledPackage): string {
  return path.join(pkg.libraryPath, COMFY_EXTENSIONS_DIR);
}

function toPackageExtension(node: z.infer<typeof CustomNodeSchema>): PackageExtension {
  const installType = INSTALL_TYPES.find((t) => t === node.install_type) ?? 'unknown';
  return {
    author: node.author,
    title: node.title,
    reference: node.reference,
    files: node.files,
    installType,
    ...(node.description !== undefined ? { description: node.description } : {}),
    ...(node.pip !== undefined ? { pipPackages: node.pip } : {}),
  };
}

/** Directory name a clone of `repoUrl` gets: its last path segment without ".git". */
export function repositoryName(repoUrl: string): string {
  const segment = repoUrl.replace(/\/+$/, '').split('/').pop() ?? '';
  const name = segment.endsWith('.git') ? segment.slice(0, -4) : segment;
  if (!name || name === '.' || name === '..') {
    throw new Error(`Cannot derive a directory name from ${repoUrl}`);
  }
  return name;
}

async function downloadFile(url: string, target: string, signal?: AbortSignal): Promise<void> {
  const res = await fetch(url, { signal });
  if (!res.ok) {
    throw new Error(`Downloading ${url} failed: HTTP ${res.status}`);
  }
  await fs.writeFile(target, Buffer.from(await res.arrayBuffer()));
}

function isNodeError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
