import { extname, join } from 'node:path';
import type { EditorMetadata, FileTypeDefinition, FileTypeId } from './types.js';

/**
 * Maps a requested path to the file an editor reads and writes. A directory
 * of a folder-shaped type resolves to its marker file; every other path is
 * returned unchanged.
 */
export function resolveDocumentPath(
  descriptor: FileTypeDefinition,
  path: string,
  isDirectory: boolean,
): string {
  if (isDirectory && descriptor.structure.kind === 'folder') {
    return join(path, descriptor.structure.markerFile);
  }
  return path;
}

export function supportsFileType(editor: EditorMetadata, fileType: FileTypeId): boolean {
  return editor.supportedFileTypes.includes(fileType);
}

/** Matches by extension, ignoring case and a trailing path separator. */
export function fileTypeForPath(
  descriptors: readonly FileTypeDefinition[],
  path: string,
): FileTypeDefinition | undefined {
  const ext = extname(path.replace(/[\\/]+$/, '')).slice(1).toLowerCase();
  if (!ext) return undefined;
  return descriptors.find((d) => d.extension.toLowerCase() === ext);
}
