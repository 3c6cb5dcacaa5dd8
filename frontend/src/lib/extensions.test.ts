import { describe, it, expect } from 'vitest';
import type { InstalledPackageExtension, PackageExtension } from '../types';
import {
  installedExtensionKey,
  installedExtensionTitle,
  packageExtensionKey,
  stripGitSuffix,
  synchronize,
} from './extensions';

function ext(title: string, files: string[], author = 'someone'): PackageExtension {
  return { author, title, reference: `https://github.com/${author}/${title}`, files, installType: 'git-clone' };
}

const impact = ext('Impact-Pack', ['https://github.com/someone/Impact-Pack']);
const saver = ext('Image-Saver', ['https://github.com/someone/Image-Saver.git']);

describe('extension identity', () => {
  it('keys available extensions by author, title and reference', () => {
    expect(packageExtensionKey(impact)).toBe('someoneImpact-Packhttps://github.com/someone/Impact-Pack');
  });

  it('keys installed extensions by first path, then repository url, then version', () => {
    expect(installedExtensionKey({ paths: ['/c/custom_nodes/a', '/c/b'] })).toBe('/c/custom_nodes/a');
    expect(installedExtensionKey({ paths: [], gitRepositoryUrl: 'https://x/y.git' })).toBe('https://x/y.git');
    expect(installedExtensionKey({ paths: [], version: { branch: 'main' } })).toBe('version:{"branch":"main"}');
  });

  it('titles installed extensions by definition, then path segment', () => {
    expect(installedExtensionTitle({ paths: ['/c/custom_nodes/Foo'], definition: impact })).toBe('Impact-Pack');
    expect(installedExtensionTitle({ paths: ['/c/custom_nodes/Foo/'] })).toBe('Foo');
    expect(installedExtensionTitle({ paths: [], gitRepositoryUrl: 'https://x/Bar.git' })).toBe('Bar');
  });

  it('strips a single .git suffix', () => {
    expect(stripGitSuffix('https://x/y.git')).toBe('https://x/y');
    expect(stripGitSuffix('https://x/y.git.git')).toBe('https://x/y.git');
    expect(stripGitSuffix('https://x/y')).toBe('https://x/y');
  });
});

describe('synchronize', () => {
  it('attaches the definition when the repository url matches a file ignoring .git', () => {
    const installed: InstalledPackageExtension = {
      paths: ['/c/custom_nodes/Impact-Pack'],
      gitRepositoryUrl: 'https://github.com/someone/Impact-Pack.git',
    };

    const result = synchronize([impact, saver], [installed]);

    expect(result.installed).toEqual([{ ...installed, definition: impact }]);
    expect(result.available).toEqual([impact, saver]);
  });

  it('matches a file declared with .git against a url without it', () => {
    const installed = { paths: ['/c/custom_nodes/Image-Saver'], gitRepositoryUrl: 'https://github.com/someone/Image-Saver' };
    expect(synchronize([saver], [installed]).installed[0].definition).toBe(saver);
  });

  it('passes through extensions without a url or without a match', () => {
    const noUrl: InstalledPackageExtension = { paths: ['/c/custom_nodes/local.py'] };
    const unknown: InstalledPackageExtension = { paths: ['/c/custom_nodes/X'], gitRepositoryUrl: 'https://x/unknown.git' };

    const result = synchronize([impact], [noUrl, unknown]);

    expect(result.installed[0]).toBe(noUrl);
    expect(result.installed[1]).toBe(unknown);
  });

  it('does not modify its inputs', () => {
    const installed: InstalledPackageExtension = { paths: ['/p'], gitRepositoryUrl: 'https://github.com/someone/Impact-Pack' };
    const available = [impact];

    synchronize(available, [installed]);

    expect(installed.definition).toBeUndefined();
    expect(available).toEqual([impact]);
  });

  it('is idempotent', () => {
    const installed = [{ paths: ['/p'], gitRepositoryUrl: 'https://github.com/someone/Impact-Pack.git' }];
    const once = synchronize([impact, saver], installed);
    const twice = synchronize(once.available, once.installed);
    expect(twice).toEqual(once);
  });

  it('keeps identities unchanged', () => {
    const installed = [
      { paths: ['/a'], gitRepositoryUrl: 'https://github.com/someone/Impact-Pack' },
      { paths: ['/b'] },
    ];
    const result = synchronize([impact], installed);
    expect(result.installed.map(installedExtensionKey)).toEqual(['/a', '/b']);
  });

  it('picks the smallest identity key when several extensions share a file, whatever the order', () => {
    const shared = 'https://github.com/shared/repo';
    const fromZed = ext('Repo', [shared], 'zed');
    const fromAnn = ext('Repo', [`${shared}.git`], 'ann');
    const installed = [{ paths: ['/r'], gitRepositoryUrl: `${shared}.git` }];

    expect(synchronize([fromZed, fromAnn], installed).installed[0].definition).toBe(fromAnn);
    expect(synchronize([fromAnn, fromZed], installed).installed[0].definition).toBe(fromAnn);
  });
});
