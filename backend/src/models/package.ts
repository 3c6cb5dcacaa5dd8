/** Installed packages (inference front ends on disk) and what their type supports. */

import type { ExtensionManager } from '../services/extensions/extensionManager.js';

export interface InstalledPackage {
  id: string;
  displayName: string;
  /** Key into the base package registry, e.g. "comfyui". */
  packageName: string;
  /** Root directory of the install. */
  libraryPath: string;
}

export interface BasePackage {
  name: string;
  displayName: string;
  /** Absent when the package type has no extension support. */
  extensionManager?: ExtensionManager;
}

export interface PackagePair {
  basePackage: BasePackage;
  installedPackage: InstalledPackage;
}
