/**
 * File Access - Read-only view over a package's files
 *
 * All paths are package-relative with forward slashes. Reads are synchronous
 * and never hold a handle beyond the call.
 */

import * as fs from 'fs';
import * as path from 'path';
import { FileAccessError } from './errors';

export interface FileAccess {
  fileExists(filePath: string): boolean;
  /** Package-relative paths of every file below filePath, sorted */
  listFiles(filePath: string): string[];
  getFileContents(filePath: string): Buffer;
  getRootPath(): string;
}

function requirePath(filePath: string): string {
  if (typeof filePath !== 'string') {
    throw new TypeError('path must not be null');
  }
  return filePath;
}

/**
 * Forward slashes, no leading "./" or "/", no trailing slash. "" and "."
 * both mean the package root.
 */
export function normalizePackagePath(filePath: string): string {
  const slashed = requirePath(filePath).replace(/\\/g, '/');
  const trimmed = slashed.replace(/^(\.\/)+/, '').replace(/^\/+/, '').replace(/\/+$/, '');
  return trimmed === '.' ? '' : trimmed;
}

/** Files directly at the package root */
export function rootFiles(fileAccess: FileAccess): string[] {
  return fileAccess.listFiles('').filter(file => !file.includes('/'));
}

export class LocalFileAccess implements FileAccess {
  private readonly root: string;

  constructor(rootDir: string) {
    this.root = path.resolve(rootDir);
  }

  getRootPath(): string {
    return this.root;
  }

  fileExists(filePath: string): boolean {
    const absolute = this.resolve(filePath);
    return absolute !== null && fs.existsSync(absolute);
  }

  listFiles(filePath: string): string[] {
    const relative = normalizePackagePath(filePath);
    const absolute = this.resolve(relative);
    if (absolute === null) {
      throw new FileAccessError(`Path escapes package root: ${filePath}`, filePath);
    }

    const files: string[] = [];
    const pending: string[] = [relative];

    let current = pending.pop();
    while (current !== undefined) {
      const directory = path.join(this.root, current);
      let entries: fs.Dirent[];
      try {
        entries = fs.readdirSync(directory, { withFileTypes: true });
      } catch (error) {
        throw new FileAccessError(`Cannot read directory: ${current || '.'}`, current, { cause: error });
      }

      for (const entry of entries) {
        const child = current === '' ? entry.name : `${current}/${entry.name}`;
        if (entry.isDirectory()) {
          pending.push(child);
        } else if (entry.isFile()) {
          files.push(child);
        }
      }
      current = pending.pop();
    }

    return files.sort();
  }

  getFileContents(filePath: string): Buffer {
    const absolute = this.resolve(filePath);
    if (absolute === null) {
      throw new FileAccessError(`Path escapes package root: ${filePath}`, filePath);
    }

    try {
      return fs.readFileSync(absolute);
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        throw new FileAccessError(`File not found: ${filePath}`, filePath, { cause: error });
      }
      throw new FileAccessError(`Cannot read file: ${filePath}`, filePath, { cause: error });
    }
  }

  /** Absolute path inside the root, or null when the path would leave it */
  private resolve(filePath: string): string | null {
    const absolute = path.resolve(this.root, normalizePackagePath(filePath));
    if (absolute !== this.root && !absolute.startsWith(this.root + path.sep)) {
      return null;
    }
    return absolute;
  }
}

export class InMemoryFileAccess implements FileAccess {
  private readonly files = new Map<string, Buffer>();

  constructor(files: Record<string, string | Buffer>, private readonly rootPath = 'memory:/') {
    for (const [name, contents] of Object.entries(files)) {
      this.files.set(
        normalizePackagePath(name),
        typeof contents === 'string' ? Buffer.from(contents, 'utf8') : contents
      );
    }
  }

  getRootPath(): string {
    return this.rootPath;
  }

  fileExists(filePath: string): boolean {
    const normalized = normalizePackagePath(filePath);
    if (this.files.has(normalized)) {
      return true;
    }
    // Directories, the root included, exist implicitly
    if (normalized === '') {
      return this.files.size > 0;
    }
    const prefix = `${normalized}/`;
    return [...this.files.keys()].some(name => name.startsWith(prefix));
  }

  listFiles(filePath: string): string[] {
    const normalized = normalizePackagePath(filePath);
    const prefix = normalized === '' ? '' : `${normalized}/`;
    return [...this.files.keys()].filter(name => name.startsWith(prefix)).sort();
  }

  getFileContents(filePath: string): Buffer {
    const contents = this.files.get(normalizePackagePath(filePath));
    if (contents === undefined) {
      throw new FileAccessError(`File not found: ${filePath}`, filePath);
    }
    return contents;
  }
}
