/**
 * Temporary directories for tests that touch the filesystem
 * (template directories, config files). Each test gets its own directory and
 * removes it in afterEach.
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

export interface TempDirContext {
  path: string;
  /** Remove the directory and everything in it */
  cleanup: () => void;
  /** Write a file, creating parent directories; returns the absolute path */
  writeFile: (relativePath: string, content: string) => string;
  /** Copy a file from tests/fixtures into the directory */
  copyFixture: (fixturePath: string, relativePath?: string) => string;
}

export const FIXTURES_DIR = path.resolve(__dirname, '..', 'fixtures');

export function createTempDirContext(prefix = 'conductor-test-'): TempDirContext {
  const dirPath = fs.mkdtempSync(path.join(os.tmpdir(), prefix));

  const writeFile = (relativePath: string, content: string): string => {
    const fullPath = path.join(dirPath, relativePath);
    fs.mkdirSync(path.dirname(fullPath), { recursive: true });
    fs.writeFileSync(fullPath, content, 'utf-8');
    return fullPath;
  };

  return {
    path: dirPath,
    cleanup: () => fs.rmSync(dirPath, { recursive: true, force: true }),
    writeFile,
    copyFixture: (fixturePath: string, relativePath?: string): string =>
      writeFile(
        relativePath ?? path.basename(fixturePath),
        fs.readFileSync(path.join(FIXTURES_DIR, fixturePath), 'utf-8')
      ),
  };
}
