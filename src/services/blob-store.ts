/**
 * Blob Store
 *
 * Line-delimited records are kept as objects under a prefix. The pipeline
 * only needs to list a prefix, read an object line by line and write an
 * object; `FileSystemBlobStore` maps objects to files under a root directory.
 */

import { createReadStream, promises as fs } from 'fs';
import path from 'path';
import { createInterface } from 'readline';
import { InputError } from '../lib/errors.js';

export interface BlobStore {
  /** Object keys under a prefix (directories excluded), sorted */
  list(prefix: string): Promise<string[]>;
  /** Lines of an object, without trailing newlines */
  readLines(key: string): AsyncIterable<string>;
  /** Write (or replace) an object, returning its URI */
  write(key: string, content: string): Promise<string>;
  /** URI of a key as reported to callers */
  uriOf(key: string): string;
}

/**
 * Strip a `file://` scheme and surrounding slashes from a prefix
 */
export function normalizePrefix(prefix: string): string {
  return prefix.replace(/^file:\/\//, '').replace(/^\/+|\/+$/g, '');
}

/**
 * Blob store backed by a local directory
 */
export class FileSystemBlobStore implements BlobStore {
  private readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  /**
   * Resolve a key inside the root, rejecting keys that escape it
   */
  private resolve(key: string): string {
    const resolved = path.resolve(this.root, normalizePrefix(key));
    if (resolved !== this.root && !resolved.startsWith(this.root + path.sep)) {
      throw new InputError('load', `Key escapes the store root: ${key}`, 'key');
    }
    return resolved;
  }

  uriOf(key: string): string {
    return `file://${this.resolve(key)}`;
  }

  async list(prefix: string): Promise<string[]> {
    const base = this.resolve(prefix);
    const keys: string[] = [];

    let entries: string[];
    try {
      entries = await fs.readdir(base, { recursive: true });
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    for (const entry of entries) {
      const full = path.join(base, entry);
      const stat = await fs.stat(full);
      if (stat.isFile()) {
        keys.push(path.relative(this.root, full).split(path.sep).join('/'));
      }
    }

    return keys.sort();
  }

  async *readLines(key: string): AsyncIterable<string> {
    const stream = createReadStream(this.resolve(key), { encoding: 'utf8' });
    const lines = createInterface({ input: stream, crlfDelay: Infinity });
    try {
      for await (const line of lines) {
        yield line;
      }
    } finally {
      lines.close();
      stream.destroy();
    }
  }

  async write(key: string, content: string): Promise<string> {
    const target = this.resolve(key);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content, 'utf8');
    return this.uriOf(key);
  }
}
