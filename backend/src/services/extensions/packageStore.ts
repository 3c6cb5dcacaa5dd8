/** Installed packages (read from packages.json) and the package types they map to. */

import fs from 'node:fs';
import { z } from 'zod';
import type { BasePackage, InstalledPackage, PackagePair } from '../../models/package.js';
import { ComfyExtensionManager } from './comfyExtensionManager.js';
import { PackageNotFoundError } from './errors.js';
import { Logger, errorMessage } from '../../utils/logger.js';

const InstalledPackageSchema = z.object({
  id: z.string().min(1),
  displayName: z.string().min(1),
  packageName: z.string().min(1),
  libraryPath: z.string().min(1),
});

const PackagesFileSchema = z.object({
  packages: z.array(InstalledPackageSchema),
});

/** Package types known to the app. Only ComfyUI hosts extensions. */
export function createBasePackages(logger?: Logger): BasePackage[] {
  return [
    { name: 'comfyui', displayName: 'ComfyUI', extensionManager: new ComfyExtensionManager({ logger }) },
    { name: 'stable-diffusion-webui', displayName: 'Stable Diffusion WebUI' },
    { name: 'fooocus', displayName: 'Fooocus' },
  ];
}

export class PackageStore {
  private readonly basePackages: Map<string, BasePackage>;
  private readonly logger: Logger;

  constructor(
    private readonly packagesFile: string,
    basePackages: BasePackage[],
    logger?: Logger,
  ) {
    this.basePackages = new Map(basePackages.map((p) => [p.name, p]));
    this.logger = (logger ?? Logger.create()).child('PackageStore');
  }

  /** Installed packages, re-read on every call. A missing file means none. */
  list(): InstalledPackage[] {
    if (!fs.existsSync(this.packagesFile)) return [];
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.packagesFile, 'utf-8'));
    } catch (err) {
      this.logger.warn('Could not read packages file', { file: this.packagesFile, error: errorMessage(err) });
      return [];
    }
    const parsed = PackagesFileSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn('Packages file is invalid', { file: this.packagesFile, issues: parsed.error.issues.length });
      return [];
    }
    return parsed.data.packages;
  }

  getBasePackage(name: string): BasePackage | undefined {
    return this.basePackages.get(name);
  }

  /** The installed package and its type. Throws PackageNotFoundError for unknown ids or types. */
  getPair(id: string): PackagePair {
    const installedPackage = this.list().find((p) => p.id === id);
    const basePackage = installedPackage && this.basePackages.get(installedPackage.packageName);
    if (!installedPackage || !basePackage) {
      throw new PackageNotFoundError(id);
    }
    return { basePackage, installedPackage };
  }
}
