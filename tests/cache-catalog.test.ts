import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import {
  buildCacheCatalog,
  CacheCatalogSource,
  matchExtension,
  parseCacheFileName,
} from '../src/catalogs/cache-catalog';
import { CacheUnreadableError, MalformedCacheFilenameError } from '../src/utils/errors';
import { createTmpDir, memoryLogger, removeTmpDir, thrownBy, writeCacheFiles } from './helpers';

describe('matchExtension', () => {
  const extensions = ['pkg.tar.xz', 'pkg.tar.zst', 'tar.zst'];

  it('returns the recognised suffix', () => {
    expect(matchExtension('curl-7.80.0-1-x86_64.pkg.tar.xz', extensions)).toBe('pkg.tar.xz');
  });

  it('prefers the longest match', () => {
    expect(matchExtension('curl-7.80.0-1-x86_64.pkg.tar.zst', extensions)).toBe('pkg.tar.zst');
  });

  it('ignores signatures and partial downloads', () => {
    expect(matchExtension('curl-7.80.0-1-x86_64.pkg.tar.zst.sig', extensions)).toBeNull();
    expect(matchExtension('curl-7.80.0-1-x86_64.pkg.tar.zst.part', extensions)).toBeNull();
  });

  it('accepts configured suffixes with a leading dot', () => {
    expect(matchExtension('a-1-1-any.pkg.tar.gz', ['.pkg.tar.gz'])).toBe('pkg.tar.gz');
  });
});

describe('parseCacheFileName', () => {
  it('parses <name>-<version>-<release>.<arch>.<ext> with a hyphenated name', () => {
    const entry = parseCacheFileName('foo-bar-1.0-3.any.pkg.tar.xz', 'pkg.tar.xz', '/var/cache/pacman/pkg');
    expect(entry).toEqual({
      kind: 'cache-file',
      name: 'foo-bar',
      version: '1.0',
      releaseNumber: '3',
      architecture: 'any',
      fileName: 'foo-bar-1.0-3.any.pkg.tar.xz',
      filePath: '/var/cache/pacman/pkg/foo-bar-1.0-3.any.pkg.tar.xz',
      extension: 'pkg.tar.xz',
    });
  });

  it('parses pacman archive names with a hyphen before the architecture', () => {
    const entry = parseCacheFileName('curl-7.80.0-1-x86_64.pkg.tar.zst', 'pkg.tar.zst', '/cache');
    expect(entry.name).toBe('curl');
    expect(entry.version).toBe('7.80.0');
    expect(entry.releaseNumber).toBe('1');
    expect(entry.architecture).toBe('x86_64');
  });

  it('keeps dotted release numbers and epochs', () => {
    const entry = parseCacheFileName('python-foo-1:2.0-1.1-any.pkg.tar.zst', 'pkg.tar.zst', '/cache');
    expect(entry.name).toBe('python-foo');
    expect(entry.version).toBe('1:2.0');
    expect(entry.releaseNumber).toBe('1.1');
    expect(entry.architecture).toBe('any');
  });

  it('resolves the file path against the directory', () => {
    const entry = parseCacheFileName('a-1-1-any.pkg.tar.xz', 'pkg.tar.xz', 'relative/cache');
    expect(entry.filePath).toBe(path.resolve('relative/cache', 'a-1-1-any.pkg.tar.xz'));
  });

  it.each([
    ['curl-1-x86_64.pkg.tar.xz', 'expected <name>-<version>-<release>'],
    ['curl.pkg.tar.xz', 'no architecture before the extension'],
    ['-1-1-any.pkg.tar.xz', 'expected <name>-<version>-<release>'],
    ['x86_64.pkg.tar.xz', 'no architecture before the extension'],
    ['curl--1-any.pkg.tar.xz', 'empty version, release or architecture'],
    ['curl-1-1-.pkg.tar.xz', 'empty version, release or architecture'],
  ])('rejects %s', (fileName, reason) => {
    expect(() => parseCacheFileName(fileName, 'pkg.tar.xz', '/cache')).toThrow(
      new MalformedCacheFilenameError(fileName, reason)
    );
  });
});

describe('buildCacheCatalog', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = createTmpDir();
  });

  afterEach(() => {
    removeTmpDir(tmpDir);
  });

  it('includes only files with a recognised extension', () => {
    writeCacheFiles(tmpDir, [
      'curl-7.80.0-1-x86_64.pkg.tar.zst',
      'curl-7.80.0-1-x86_64.pkg.tar.zst.sig',
      'wget-1.2-1.any.pkg.tar.xz',
      'notes.txt',
    ]);
    fs.mkdirSync(path.join(tmpDir, 'download-abc.pkg.tar.zst'));

    const catalog = buildCacheCatalog(tmpDir);
    expect(catalog.names().sort()).toEqual(['curl', 'wget']);
    expect(catalog.byName('wget')[0].filePath).toBe(path.join(tmpDir, 'wget-1.2-1.any.pkg.tar.xz'));
  });

  it('honours a custom extension list', () => {
    writeCacheFiles(tmpDir, ['a-1-1-any.pkg.tar.xz', 'b-1-1-any.pkg.tar.zst']);
    const catalog = buildCacheCatalog(tmpDir, { extensions: ['pkg.tar.xz'] });
    expect(catalog.names()).toEqual(['a']);
  });

  it('returns an empty catalog for an empty directory', () => {
    expect(buildCacheCatalog(tmpDir).size).toBe(0);
  });

  it('fails with CacheUnreadableError when the directory is missing', () => {
    const missing = path.join(tmpDir, 'missing');
    const error = thrownBy(() => buildCacheCatalog(missing));
    expect(error).toBeInstanceOf(CacheUnreadableError);
    expect(error).toMatchObject({ code: 'CACHE_UNREADABLE', path: missing });
  });

  it('aborts on a malformed file name by default', () => {
    writeCacheFiles(tmpDir, ['curl-7.80.0-1-x86_64.pkg.tar.zst', 'broken.pkg.tar.zst']);
    expect(() => buildCacheCatalog(tmpDir)).toThrow('Malformed package file name "broken.pkg.tar.zst"');
  });

  it('skips malformed file names with a warning under the warn policy', () => {
    writeCacheFiles(tmpDir, ['curl-7.80.0-1-x86_64.pkg.tar.zst', 'broken.pkg.tar.zst']);
    const { log, lines } = memoryLogger();

    const catalog = buildCacheCatalog(tmpDir, { onMalformed: 'warn' }, log);

    expect(catalog.names()).toEqual(['curl']);
    expect(lines).toContain(
      '⚠ Skipping Malformed package file name "broken.pkg.tar.zst": no architecture before the extension'
    );
  });

  it('treats an architecture outside the configured list as malformed', () => {
    writeCacheFiles(tmpDir, ['curl-7.80.0-1-riscv64.pkg.tar.zst']);
    const source = new CacheCatalogSource(tmpDir, { architectures: ['any', 'x86_64'] });
    expect(() => source.scan()).toThrow(
      new MalformedCacheFilenameError('curl-7.80.0-1-riscv64.pkg.tar.zst', 'unknown architecture "riscv64"')
    );
  });

  it('accepts any architecture when the list is empty', () => {
    writeCacheFiles(tmpDir, ['curl-7.80.0-1-riscv64.pkg.tar.zst']);
    expect(buildCacheCatalog(tmpDir, { architectures: [] }).size).toBe(1);
  });
});
