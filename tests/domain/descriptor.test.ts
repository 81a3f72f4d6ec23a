import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'node:fs';
import { join } from 'node:path';
import { ENUM_EDITOR, ENUM_FILE_TYPE } from '../../src/domain/descriptor/enum-descriptor.js';
import { fileTypeForPath, resolveDocumentPath, supportsFileType } from '../../src/domain/descriptor/resolve.js';
import { scaffoldDocument } from '../../src/domain/descriptor/scaffold.js';
import { fileTypeId, type FileTypeDefinition } from '../../src/domain/descriptor/types.js';
import { DuplicateError } from '../../src/infra/errors.js';
import { makeTempDir, readJson, removeDir } from '../fixtures/test-helpers.js';

const NOTE_TYPE: FileTypeDefinition = {
  id: fileTypeId('note'),
  extension: 'note',
  displayName: 'Note',
  icon: 'file',
  color: '#000000',
  structure: { kind: 'single-file' },
  defaultContent: { name: 'Untitled', body: '' },
  categories: [],
};

describe('enum descriptor', () => {
  it('is a folder with an enum.json marker', () => {
    expect(ENUM_FILE_TYPE.id).toBe('enum');
    expect(ENUM_FILE_TYPE.structure).toEqual({ kind: 'folder', markerFile: 'enum.json', templateStructure: [] });
    expect(ENUM_FILE_TYPE.defaultContent).toEqual({ name: 'NewEnum', variants: [] });
  });

  it('pairs enum-editor with the enum file type', () => {
    expect(ENUM_EDITOR.id).toBe('enum-editor');
    expect(supportsFileType(ENUM_EDITOR, ENUM_FILE_TYPE.id)).toBe(true);
    expect(supportsFileType(ENUM_EDITOR, NOTE_TYPE.id)).toBe(false);
  });
});

describe('resolveDocumentPath', () => {
  it('resolves a folder to its marker file', () => {
    expect(resolveDocumentPath(ENUM_FILE_TYPE, 'Colors.enum', true)).toBe(join('Colors.enum', 'enum.json'));
  });

  it('keeps a file path unchanged', () => {
    expect(resolveDocumentPath(ENUM_FILE_TYPE, 'Colors.enum/enum.json', false)).toBe('Colors.enum/enum.json');
  });

  it('keeps a directory unchanged for single-file types', () => {
    expect(resolveDocumentPath(NOTE_TYPE, 'notes', true)).toBe('notes');
  });
});

describe('fileTypeForPath', () => {
  const types = [ENUM_FILE_TYPE, NOTE_TYPE];

  it('matches by extension', () => {
    expect(fileTypeForPath(types, '/work/Colors.enum')?.id).toBe('enum');
    expect(fileTypeForPath(types, '/work/todo.NOTE')?.id).toBe('note');
  });

  it('ignores a trailing separator', () => {
    expect(fileTypeForPath(types, '/work/Colors.enum/')?.id).toBe('enum');
  });

  it('returns undefined for unknown or missing extensions', () => {
    expect(fileTypeForPath(types, '/work/readme.md')).toBeUndefined();
    expect(fileTypeForPath(types, '/work/Makefile')).toBeUndefined();
  });
});

describe('scaffoldDocument', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir('scaffold');
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('creates a folder document with the default content', async () => {
    const path = await scaffoldDocument(ENUM_FILE_TYPE, dir, 'Direction');
    expect(path).toBe(join(dir, 'Direction.enum'));
    expect(await readJson(join(path, 'enum.json'))).toEqual({ name: 'Direction', variants: [] });
  });

  it('writes extra template files next to the marker', async () => {
    const withReadme: FileTypeDefinition = {
      ...ENUM_FILE_TYPE,
      structure: {
        kind: 'folder',
        markerFile: 'enum.json',
        templateStructure: [{ path: 'docs/README.md', content: '# Enum\n' }],
      },
    };
    const path = await scaffoldDocument(withReadme, dir, 'Size');
    expect(await fs.readFile(join(path, 'docs', 'README.md'), 'utf-8')).toBe('# Enum\n');
  });

  it('creates a single-file document', async () => {
    const path = await scaffoldDocument(NOTE_TYPE, dir, 'todo', 0);
    expect(path).toBe(join(dir, 'todo.note'));
    expect(await fs.readFile(path, 'utf-8')).toBe('{"name":"todo","body":""}\n');
  });

  it('refuses to overwrite', async () => {
    await scaffoldDocument(ENUM_FILE_TYPE, dir, 'Direction');
    await expect(scaffoldDocument(ENUM_FILE_TYPE, dir, 'Direction')).rejects.toThrow(DuplicateError);
  });
});
