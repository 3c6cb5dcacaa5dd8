import type { InstalledPackageExtension, PackageExtension } from '../types';

export function packageExtensionKey(ext: PackageExtension): string {
  return ext.author + ext.title + ext.reference;
}

export function installedExtensionKey(ext: InstalledPackageExtension): string {
  return ext.paths[0] ?? ext.gitRepositoryUrl ?? `version:${JSON.stringify(ext.version ?? {})}`;
}

function lastSegment(source: string): string {
  const segment = source.split(/[\\/]/).filter(Boolean).pop() ?? '';
  return segment.endsWith('.git') ? segment.slice(0, -4) : segment;
}

export function installedExtensionTitle(ext: InstalledPackageExtension): string {
  if (ext.definition) return ext.definition.title;
  return lastSegment(ext.paths[0] ?? ext.gitRepositoryUrl ?? '');
}

/** Drop one trailing ".git" so clone URLs and repository URLs compare equal. */
export function stripGitSuffix(reference: string): string {
  return reference.endsWith('.git') ? reference.slice(0, -4) : reference;
}

/**
 * Annotate installed extensions with the available extension whose declared
 * files include their repository URL. Inputs are not modified.
 *
 * When several available extensions declare the same file, the one with the
 * smallest identity key wins.
 */
export function synchronize(
  available: readonly PackageExtension[],
  installed: readonly InstalledPackageExtension[],
): { available: PackageExtension[]; installed: InstalledPackageExtension[] } {
  const byFile = new Map<string, PackageExtension>();
  for (const ext of available) {
    const key = packageExtensionKey(ext);
    for (const file of ext.files) {
      const reference = stripGitSuffix(file);
      const existing = byFile.get(reference);
      if (!existing || key < packageExtensionKey(existing)) byFile.set(reference, ext);
    }
  }

  const synced = installed.map((ext) => {
    if (!ext.gitRepositoryUrl) return ext;
    const definition = byFile.get(stripGitSuffix(ext.gitRepositoryUrl));
    return definition ? { ...ext, definition } : ext;
  });

  return { available: [...available], installed: synced };
}
