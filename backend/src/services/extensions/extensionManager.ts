/** Contract between a package type and the extensions it can host. */

import type { InstalledPackage } from '../../models/package.js';
import type { InstalledPackageExtension, PackageExtension } from '../../models/extension.js';

export interface StepProgress {
  message: string;
  /** 0..1, or null when indeterminate. */
  value: number | null;
}

export type ProgressReporter = (progress: StepProgress) => void;

export interface ExtensionManager {
  /** Manifest URLs listing the extensions available to the package. */
  getManifests(pkg: InstalledPackage): string[];
  /** Fetch and merge the extensions listed in the given manifests. */
  getManifestExtensions(manifestUrls: readonly string[], signal?: AbortSignal): Promise<PackageExtension[]>;
  getInstalledExtensions(pkg: InstalledPackage, signal?: AbortSignal): Promise<InstalledPackageExtension[]>;
  installExtension(
    pkg: InstalledPackage,
    extension: PackageExtension,
    report: ProgressReporter,
    signal?: AbortSignal,
  ): Promise<void>;
  uninstallExtension(
    pkg: InstalledPackage,
    installed: InstalledPackageExtension,
    report: ProgressReporter,
    signal?: AbortSignal,
  ): Promise<void>;
}
