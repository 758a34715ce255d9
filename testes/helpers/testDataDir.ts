/**
 * Diretorios de teste isolados.
 *
 * Cada teste recebe seu proprio diretorio unico em os.tmpdir().
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';

export interface TestDataDir {
  /**
   * Caminho absoluto do diretorio de teste
   */
  dir: string;

  /**
   * Remove o diretorio recursivamente
   */
  cleanup: () => Promise<void>;
}

/**
 * Cria um diretorio de teste unico.
 *
 * @example
 * ```typescript
 * let testDir: TestDataDir;
 *
 * beforeEach(async () => {
 *   testDir = await createTestDataDir('registros');
 * });
 *
 * afterEach(async () => {
 *   await testDir.cleanup();
 * });
 * ```
 */
export async function createTestDataDir(prefix: string = 'test'): Promise<TestDataDir> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), `caderno-${prefix}-`));

  return {
    dir,
    cleanup: () => fs.rm(dir, { recursive: true, force: true })
  };
}
