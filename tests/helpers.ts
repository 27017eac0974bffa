import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { Catalog } from '../src/core/catalog';
import type { CacheFileEntry, InstalledRecord } from '../src/types';
import { Logger, LogLevel } from '../src/utils/logger';

// ---------------------------------------------------------------------------
// Temporary directories
// ---------------------------------------------------------------------------

export function createTmpDir(prefix = 'paclean-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeTmpDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function writeCacheFiles(dir: string, fileNames: string[], content = 'archive'): void {
  fs.mkdirSync(dir, { recursive: true });
  for (const name of fileNames) {
    fs.writeFileSync(path.join(dir, name), content);
  }
}

export function descContent(name: string, version: string, arch: string): string {
  return ['%NAME%', name, '', '%VERSION%', version, '', '%ARCH%', arch, ''].join('\n');
}

/**
 * Write one `<name>-<version>/desc` directory per package
 */
export function writeInstalledDb(dir: string, packages: Array<[name: string, version: string, arch: string]>): void {
  fs.mkdirSync(dir, { recursive: true });
  for (const [name, version, arch] of packages) {
    const pkgDir = path.join(dir, `${name}-${version}`);
    fs.mkdirSync(pkgDir, { recursive: true });
    fs.writeFileSync(path.join(pkgDir, 'desc'), descContent(name, version, arch));
  }
}

// ---------------------------------------------------------------------------
// In-memory fixtures
// ---------------------------------------------------------------------------

export function cacheEntry(
  name: string,
  version: string,
  releaseNumber: string,
  architecture = 'x86_64',
  extension = 'pkg.tar.zst'
): CacheFileEntry {
  const fileName = `${name}-${version}-${releaseNumber}-${architecture}.${extension}`;
  return {
    kind: 'cache-file',
    name,
    version,
    releaseNumber,
    architecture,
    fileName,
    filePath: `/cache/${fileName}`,
    extension,
  };
}

export function installedRecord(name: string, version = '1.0', releaseNumber = '1', architecture = 'x86_64'): InstalledRecord {
  return {
    kind: 'installed',
    name,
    version,
    releaseNumber,
    architecture,
    directory: `${name}-${version}-${releaseNumber}`,
  };
}

export function installedCatalog(...names: string[]): Catalog<InstalledRecord> {
  return new Catalog(names.map((name) => installedRecord(name)));
}

export function stripAnsi(text: string): string {
  return text.replace(/\u001b\[[0-9;]*m/g, '');
}

/**
 * Logger that records uncoloured lines instead of writing to stderr
 */
export function memoryLogger(level: LogLevel = LogLevel.DEBUG): { log: Logger; lines: string[] } {
  const lines: string[] = [];
  return { log: new Logger(level, (line) => lines.push(stripAnsi(line))), lines };
}

/**
 * The value a function throws, or undefined if it returns
 */
export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}
