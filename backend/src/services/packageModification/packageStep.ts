/** One unit of work applied to an installed package. */

import type { InstalledPackage } from '../../models/package.js';
import {
  installedExtensionTitle,
  type InstalledPackageExtension,
  type PackageExtension,
} from '../../models/extension.js';
import type { ExtensionManager, ProgressReporter } from '../extensions/extensionManager.js';

export interface PackageStep {
  readonly progressTitle: string;
  execute(report: ProgressReporter, signal: AbortSignal): Promise<void>;
}

export class InstallExtensionStep implements PackageStep {
  readonly progressTitle: string;

  constructor(
    private readonly manager: ExtensionManager,
    private readonly pkg: InstalledPackage,
    private readonly extension: PackageExtension,
  ) {
    this.progressTitle = `Installing ${extension.title}`;
  }

  execute(report: ProgressReporter, signal: AbortSignal): Promise<void> {
    return this.manager.installExtension(this.pkg, this.extension, report, signal);
  }
}

export class UninstallExtensionStep implements PackageStep {
  readonly progressTitle: string;

  constructor(
    private readonly manager: ExtensionManager,
    private readonly pkg: InstalledPackage,
    private readonly installed: InstalledPackageExtension,
  ) {
    this.progressTitle = `Uninstalling ${installedExtensionTitle(installed)}`;
  }

  execute(report: ProgressReporter, signal: AbortSignal): Promise<void> {
    return this.manager.uninstallExtension(this.pkg, this.installed, report, signal);
  }
}
