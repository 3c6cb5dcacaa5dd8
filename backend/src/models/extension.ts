/** Installable package extensions and the ones found in a package install. */

export type ExtensionInstallType = 'git-clone' | 'copy' | 'unknown';

export interface PackageExtension {
  author: string;
  title: string;
  reference: string;
  files: string[];
  installType: ExtensionInstallType;
  description?: string;
  pipPackages?: string[];
}

export interface InstalledExtensionVersion {
  branch?: string;
  commitSha?: string;
}

export interface InstalledPackageExtension {
  paths: string[];
  gitRepositoryUrl?: string;
  version?: InstalledExtensionVersion;
  /** The available extension this install was matched to, if any. */
  definition?: PackageExtension;
}

export function packageExtensionKey(ext: PackageExtension): string {
  return ext.author + ext.title + ext.reference;
}

/** Title shown for an installed extension. */
export function installedExtensionTitle(ext: InstalledPackageExtension): string {
  if (ext.definition) return ext.definition.title;
  const source = ext.paths[0] ?? ext.gitRepositoryUrl ?? '';
  const segment = source.split(/[\\/]/).filter(Boolean).pop() ?? '';
  return segment.endsWith('.git') ? segment.slice(0, -4) : segment;
}
