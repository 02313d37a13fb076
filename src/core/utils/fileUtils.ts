/**
 * File I/O helpers (UTF-8, synchronous)
 */

import fs from 'fs';
import path from 'path';
import { FileExistsError, FileNotFoundError, InvalidArgumentError } from '../errors';

// Names skipped by listFiles() unless includeHidden is set
const IGNORED_PATTERNS = [
  /^\./, // Hidden files
  /thumbs\.db/i,
  /\.DS_Store/,
  /desktop\.ini/i,
];

export interface ListFilesOptions {
  /** Descend into subdirectories (default false) */
  recursive?: boolean;
  /** Only keep these extensions, e.g. ['.ts', '.md'] (case-insensitive) */
  extensions?: readonly string[];
  /** Keep dotfiles and OS clutter such as Thumbs.db (default false) */
  includeHidden?: boolean;
}

export interface CopyFileOptions {
  /** Replace dest if it already exists (default false) */
  overwrite?: boolean;
}

const isMissingPathError = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

const shouldIgnore = (name: string): boolean =>
  IGNORED_PATTERNS.some((pattern) => pattern.test(name));

const ensureParentDir = (filePath: string): void => {
  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) {
    console.debug(`[files] Creating directory: ${dir}`);
    fs.mkdirSync(dir, { recursive: true });
  }
};

/**
 * Read an entire file as text
 */
export function readText(filePath: string): string {
  try {
    return fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    if (isMissingPathError(error)) {
      throw new FileNotFoundError(filePath);
    }
    throw error;
  }
}

/**
 * Write text to a file, creating parent directories as needed
 */
export function writeText(filePath: string, text: string): void {
  ensureParentDir(filePath);
  fs.writeFileSync(filePath, text, 'utf-8');
}

/**
 * Number of lines in a text file. A trailing newline does not start a new line.
 */
export function countLines(filePath: string): number {
  const text = readText(filePath);
  if (text.length === 0) return 0;
  const breaks = text.split('\n').length - 1;
  return text.endsWith('\n') ? breaks : breaks + 1;
}

/**
 * Sorted paths of the regular files under dir
 */
export function listFiles(dir: string, options: ListFilesOptions = {}): string[] {
  const { recursive = false, includeHidden = false } = options;
  const extensions = options.extensions?.map((ext) => ext.toLowerCase());

  if (!fs.existsSync(dir)) {
    throw new FileNotFoundError(dir);
  }
  if (!fs.statSync(dir).isDirectory()) {
    throw new InvalidArgumentError(`listFiles(): not a directory: ${dir}`);
  }

  const found: string[] = [];

  const scan = (currentPath: string): void => {
    const entries = fs.readdirSync(currentPath, { withFileTypes: true });
    for (const entry of entries) {
      if (!includeHidden && shouldIgnore(entry.name)) continue;

      const entryPath = path.join(currentPath, entry.name);
      if (entry.isDirectory()) {
        if (recursive) scan(entryPath);
      } else if (entry.isFile()) {
        const ext = path.extname(entry.name).toLowerCase();
        if (!extensions || extensions.includes(ext)) {
          found.push(entryPath);
        }
      }
    }
  };

  scan(dir);
  return found.sort();
}

/**
 * Copy src to dest, creating parent directories of dest as needed
 */
export function copyFile(src: string, dest: string, options: CopyFileOptions = {}): void {
  if (!fs.existsSync(src)) {
    throw new FileNotFoundError(src);
  }
  if (!options.overwrite && fs.existsSync(dest)) {
    throw new FileExistsError(dest);
  }
  ensureParentDir(dest);
  fs.copyFileSync(src, dest);
}
