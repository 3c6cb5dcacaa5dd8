import type {
  InstalledPackage,
  InstalledPackageExtension,
  ModificationResult,
  PackageExtension,
  PackageExtensions,
} from '../types';
import { packagesApi } from './apiClient';
import {
  installedExtensionKey,
  installedExtensionTitle,
  packageExtensionKey,
  synchronize,
} from './extensions';
import { ProjectedList } from './projectedList';
import { SourceCache } from './sourceCache';

export class NotSupportedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotSupportedError';
  }
}

/** Backend operations the browser needs; install and uninstall run as package steps. */
export interface ExtensionApi {
  getExtensions(packageId: string): Promise<PackageExtensions>;
  install(packageId: string, extensions: PackageExtension[]): Promise<ModificationResult>;
  uninstall(packageId: string, extensions: InstalledPackageExtension[]): Promise<ModificationResult>;
}

export const httpExtensionApi: ExtensionApi = {
  getExtensions: (packageId) => packagesApi.extensions(packageId),
  install: (packageId, extensions) => packagesApi.install(packageId, extensions),
  uninstall: (packageId, extensions) => packagesApi.uninstall(packageId, extensions),
};

const byTitle = (a: string, b: string) => a.localeCompare(b, undefined, { sensitivity: 'base' });

/**
 * View-model of the extension browser: available and installed extensions of
 * one package as keyed caches with selectable, searchable projections.
 */
export class ExtensionBrowserModel {
  readonly availableSource = new SourceCache<PackageExtension, string>(packageExtensionKey);
  readonly installedSource = new SourceCache<InstalledPackageExtension, string>(installedExtensionKey);
  readonly availableItems: ProjectedList<PackageExtension, string>;
  readonly installedItems: ProjectedList<InstalledPackageExtension, string>;

  private pkg: InstalledPackage | null = null;
  private loading = false;
  private modifying = false;
  private version = 0;
  private refreshCount = 0;
  private readonly listeners = new Set<() => void>();

  constructor(private readonly api: ExtensionApi = httpExtensionApi) {
    this.availableItems = new ProjectedList(this.availableSource, {
      titleOf: (ext) => ext.title,
      compare: (a, b) => byTitle(a.title, b.title),
    });
    this.installedItems = new ProjectedList(this.installedSource, {
      titleOf: installedExtensionTitle,
      compare: (a, b) => byTitle(installedExtensionTitle(a), installedExtensionTitle(b)),
    });
    this.availableItems.subscribe(() => this.changed());
    this.installedItems.subscribe(() => this.changed());
  }

  get package(): InstalledPackage | null {
    return this.pkg;
  }

  get isLoading(): boolean {
    return this.loading;
  }

  get isModifying(): boolean {
    return this.modifying;
  }

  get snapshot(): number {
    return this.version;
  }

  subscribe(listener: () => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Switch to another package; cached extensions of the previous one are dropped. */
  setPackage(pkg: InstalledPackage | null): void {
    if (pkg?.id === this.pkg?.id) return;
    this.pkg = pkg;
    this.availableSource.clear();
    this.installedSource.clear();
    this.changed();
  }

  addExtensions(available: readonly PackageExtension[], installed: readonly InstalledPackageExtension[]): void {
    this.availableSource.addOrUpdate(available);
    this.installedSource.addOrUpdate(installed);
  }

  async refresh(): Promise<void> {
    const pkg = this.pkg;
    if (!pkg) return;
    if (!pkg.supportsExtensions) {
      throw new NotSupportedError(`The package ${pkg.displayName} does not support extensions.`);
    }

    // Only the latest refresh may write the caches or end loading
    const request = ++this.refreshCount;
    this.setLoading(true);
    try {
      const fetched = await this.api.getExtensions(pkg.id);
      if (request !== this.refreshCount || this.pkg !== pkg) return;
      const { available, installed } = synchronize(fetched.available, fetched.installed);
      this.availableSource.editDiff(available);
      this.installedSource.editDiff(installed);
    } finally {
      if (request === this.refreshCount) this.setLoading(false);
    }
  }

  clearSelection(): void {
    this.availableItems.clearSelection();
    this.installedItems.clearSelection();
  }

  /** Install the selected available extensions. Resolves to null when nothing is selected. */
  installSelected(): Promise<ModificationResult | null> {
    const selected = this.availableItems.selected.map((wrapper) => wrapper.item);
    return this.modify(selected, (packageId, extensions) => this.api.install(packageId, extensions));
  }

  /** Uninstall the selected installed extensions. Resolves to null when nothing is selected. */
  uninstallSelected(): Promise<ModificationResult | null> {
    const selected = this.installedItems.selected.map((wrapper) => wrapper.item);
    return this.modify(selected, (packageId, extensions) => this.api.uninstall(packageId, extensions));
  }

  private async modify<T>(
    selected: T[],
    run: (packageId: string, extensions: T[]) => Promise<ModificationResult>,
  ): Promise<ModificationResult | null> {
    const pkg = this.pkg;
    if (selected.length === 0 || !pkg) return null;

    this.modifying = true;
    this.changed();
    try {
      return await run(pkg.id, selected);
    } finally {
      this.modifying = false;
      this.clearSelection();
      this.changed();
      await this.refresh();
    }
  }

  private setLoading(value: boolean): void {
    this.loading = value;
    this.changed();
  }

  private changed(): void {
    this.version += 1;
    for (const listener of [...this.listeners]) listener();
  }
}
