import { promises as fs } from 'node:fs';
import { dirname } from 'node:path';
import { isEnoent } from './fs-utils.js';
import { TMP_SUFFIX } from '../constants.js';

export interface JsonFileOptions {
  indent?: number;
}

/**
 * A single JSON document on disk. Writes go through a temp file and a rename
 * so a failed write never leaves a truncated document behind.
 */
export class JsonFile<T> {
  private indent: number;

  constructor(
    readonly path: string,
    options?: JsonFileOptions,
  ) {
    this.indent = options?.indent ?? 2;
  }

  async write(item: T): Promise<void> {
    await fs.mkdir(dirname(this.path), { recursive: true });
    const tmp = `${this.path}${TMP_SUFFIX}`;
    try {
      await fs.writeFile(tmp, JSON.stringify(item, null, this.indent) + '\n', 'utf-8');
      await fs.rename(tmp, this.path);
    } catch (e) {
      await fs.rm(tmp, { force: true });
      throw e;
    }
  }

  /** Parsed but unvalidated content; undefined when the file does not exist. */
  async read(): Promise<unknown> {
    try {
      const raw = await fs.readFile(this.path, 'utf-8');
      return JSON.parse(raw);
    } catch (e) {
      if (isEnoent(e)) return undefined;
      throw e;
    }
  }
}
