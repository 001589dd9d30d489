/**
 * Temporary workspace for file-system tests
 * Creates a fresh directory under the OS temp dir for each test
 */

import { mkdtemp, rm, readFile, writeFile, mkdir, readdir } from 'fs/promises';
import { dirname, join } from 'path';
import { tmpdir } from 'os';
import { existsSync } from 'fs';

export interface TempWorkspace {
  /** Workspace root directory */
  root: string;
  /** Absolute path of a workspace-relative path */
  path: (relativePath: string) => string;
  /** Cleanup workspace */
  cleanup: () => Promise<void>;
  /** Check file existence */
  exists: (relativePath: string) => boolean;
  /** Read file */
  readFile: (relativePath: string) => Promise<string>;
  /** Write file (parent directories are created) */
  writeFile: (relativePath: string, content: string | Uint8Array) => Promise<void>;
  /** Write a value as JSON */
  writeJson: (relativePath: string, value: unknown) => Promise<void>;
  /** Read JSON file */
  readJson: (relativePath: string) => Promise<unknown>;
  /** List files in directory, sorted */
  listDir: (relativePath: string) => Promise<string[]>;
}

/**
 * Creates temporary workspace for test
 */
export async function createTempWorkspace(prefix = 'gliffy-test-'): Promise<TempWorkspace> {
  const root = await mkdtemp(join(tmpdir(), prefix));
  const path = (relativePath: string) => join(root, relativePath);

  const workspace: TempWorkspace = {
    root,
    path,
    cleanup: async () => {
      await rm(root, { recursive: true, force: true });
    },
    exists: relativePath => existsSync(path(relativePath)),
    readFile: relativePath => readFile(path(relativePath), 'utf-8'),
    writeFile: async (relativePath, content) => {
      await mkdir(dirname(path(relativePath)), { recursive: true });
      await writeFile(path(relativePath), content);
    },
    writeJson: async (relativePath, value) => {
      await workspace.writeFile(relativePath, JSON.stringify(value));
    },
    readJson: async relativePath => {
      const parsed: unknown = JSON.parse(await readFile(path(relativePath), 'utf-8'));
      return parsed;
    },
    listDir: async relativePath => (await readdir(path(relativePath))).sort(),
  };

  return workspace;
}
