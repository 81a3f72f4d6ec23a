import { promises as fs } from 'node:fs';
import { dirname, join } from 'node:path';
import { DuplicateError } from '../../infra/errors.js';
import { pathExists } from '../../infra/fs-utils.js';
import { JsonFile } from '../../infra/json-file.js';
import type { FileTypeDefinition } from './types.js';

/**
 * Creates a new document named `baseName` under `parentDir` from the
 * descriptor's default content, with `name` set to `baseName`. Returns the
 * path the host should open (the folder for folder-shaped types).
 */
export async function scaffoldDocument(
  descriptor: FileTypeDefinition,
  parentDir: string,
  baseName: string,
  indent = 2,
): Promise<string> {
  const documentPath = join(parentDir, `${baseName}.${descriptor.extension}`);
  if (await pathExists(documentPath)) {
    throw new DuplicateError(descriptor.displayName, documentPath);
  }

  const content = { ...descriptor.defaultContent, name: baseName };
  const structure = descriptor.structure;

  if (structure.kind === 'single-file') {
    await new JsonFile(documentPath, { indent }).write(content);
    return documentPath;
  }

  await fs.mkdir(documentPath, { recursive: true });
  await new JsonFile(join(documentPath, structure.markerFile), { indent }).write(content);
  for (const extra of structure.templateStructure) {
    const target = join(documentPath, extra.path);
    await fs.mkdir(dirname(target), { recursive: true });
    await fs.writeFile(target, extra.content, 'utf-8');
  }
  return documentPath;
}
