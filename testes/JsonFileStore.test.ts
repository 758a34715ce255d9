/**
 * Testes do JsonFileStore: leitura tolerante e escrita atomica.
 */

import * as fs from 'fs/promises';
import * as path from 'path';

import { JsonFileStore } from '../utilitarios/JsonFileStore';
import { Referencia } from '../entidades/tipos';
import { createTestDataDir, TestDataDir } from './helpers/testDataDir';

describe('JsonFileStore', () => {
  let testDir: TestDataDir;
  let filePath: string;
  let logger: { warn: jest.Mock };
  let store: JsonFileStore;

  beforeEach(async () => {
    testDir = await createTestDataDir('store');
    filePath = path.join(testDir.dir, 'referencias.json');
    logger = { warn: jest.fn() };
    store = new JsonFileStore(filePath, { logger });
  });

  afterEach(async () => {
    await testDir.cleanup();
  });

  // ══════════════════════════════════════════════════════════════════════════
  // LEITURA
  // ══════════════════════════════════════════════════════════════════════════

  describe('readAll', () => {
    test('arquivo ausente retorna lista vazia', async () => {
      expect(await store.readAll()).toEqual([]);
      expect(logger.warn).not.toHaveBeenCalled();
    });

    test('JSON malformado retorna lista vazia e loga aviso', async () => {
      await fs.writeFile(filePath, '{"nm": "A"', 'utf-8');

      expect(await store.readAll()).toEqual([]);
      expect(logger.warn).toHaveBeenCalledTimes(1);
    });

    test('arquivo vazio retorna lista vazia', async () => {
      await fs.writeFile(filePath, '', 'utf-8');

      expect(await store.readAll()).toEqual([]);
    });

    test('JSON que nao e lista retorna lista vazia', async () => {
      await fs.writeFile(filePath, '{"nm": "A"}', 'utf-8');

      expect(await store.readAll()).toEqual([]);
      expect(logger.warn).toHaveBeenCalledTimes(1);
    });

    test('itens de qualquer formato sao devolvidos e regravados como estao', async () => {
      const itens = [{ nm: 'A' }, { descricao: 'sem nm' }, { nm: 123 }, 'solto', null];
      await fs.writeFile(filePath, JSON.stringify(itens), 'utf-8');

      const lidos = await store.readAll();
      expect(lidos).toEqual(itens);

      await store.writeAll([...lidos, { nm: 'B' }]);

      expect(JSON.parse(await fs.readFile(filePath, 'utf-8'))).toEqual([...itens, { nm: 'B' }]);
      expect(logger.warn).not.toHaveBeenCalled();
    });
  });

  // ══════════════════════════════════════════════════════════════════════════
  // RECUPERACAO DE .tmp
  // ══════════════════════════════════════════════════════════════════════════

  describe('recuperacao', () => {
    test('promove .tmp deixado por crash antes do rename', async () => {
      await fs.writeFile(filePath + '.tmp', JSON.stringify([{ nm: 'A' }]), 'utf-8');

      const recuperado = new JsonFileStore(filePath, { logger });

      expect(await recuperado.readAll()).toEqual([{ nm: 'A' }]);
      await expect(fs.access(filePath)).resolves.toBeUndefined();
      await expect(fs.access(filePath + '.tmp')).rejects.toThrow();
      expect(logger.warn).toHaveBeenCalledWith({ arquivo: filePath }, 'Arquivo recuperado de .tmp');
    });

    test('arquivo principal presente prevalece sobre .tmp antigo', async () => {
      await fs.writeFile(filePath, JSON.stringify([{ nm: 'A' }]), 'utf-8');
      await fs.writeFile(filePath + '.tmp', JSON.stringify([{ nm: 'velho' }]), 'utf-8');

      const comAmbos = new JsonFileStore(filePath, { logger });

      expect(await comAmbos.readAll()).toEqual([{ nm: 'A' }]);
      expect(logger.warn).not.toHaveBeenCalled();
    });

    test('leituras durante a primeira escrita nao mexem no .tmp em uso', async () => {
      const leituras = Array.from({ length: 30 }, () => store.readAll());
      const escrita = store.writeAll([{ nm: 'A' }]);
      const mais = Array.from({ length: 30 }, () => store.readAll());

      await expect(escrita).resolves.toBeUndefined();
      for (const lido of await Promise.all([...leituras, ...mais])) {
        expect([[], [{ nm: 'A' }]]).toContainEqual(lido);
      }
      expect(await fs.readdir(testDir.dir)).toEqual(['referencias.json']);
      expect(logger.warn).not.toHaveBeenCalled();
    });
  });

  // ══════════════════════════════════════════════════════════════════════════
  // ESCRITA
  // ══════════════════════════════════════════════════════════════════════════

  describe('writeAll', () => {
    test('grava JSON indentado preservando acentos', async () => {
      const itens: Referencia[] = [{ nm: 'A', descricao: 'Válvula de pressão' }];

      await store.writeAll(itens);

      const raw = await fs.readFile(filePath, 'utf-8');
      expect(raw).toBe(JSON.stringify(itens, null, 4));
      expect(raw).toContain('Válvula de pressão');
    });

    test('nao deixa .tmp apos escrita', async () => {
      await store.writeAll([{ nm: 'A' }]);

      const arquivos = await fs.readdir(testDir.dir);
      expect(arquivos).toEqual(['referencias.json']);
    });

    test('cria diretorio pai se necessario', async () => {
      const aninhado = new JsonFileStore(path.join(testDir.dir, 'a', 'b', 'refs.json'), { logger });

      await aninhado.writeAll([{ nm: 'A' }]);

      expect(await aninhado.readAll()).toEqual([{ nm: 'A' }]);
    });

    test('escritas concorrentes terminam na ordem de chamada', async () => {
      const escritas = Array.from({ length: 10 }, (_, i) => store.writeAll([{ nm: `NM-${i}` }]));

      await Promise.all(escritas);

      expect(await store.readAll()).toEqual([{ nm: 'NM-9' }]);
    });

    test('falha de escrita propaga sem travar escritas seguintes', async () => {
      // rename sobre um diretorio falha
      await fs.mkdir(filePath);

      await expect(store.writeAll([{ nm: 'A' }])).rejects.toThrow();

      await fs.rm(filePath, { recursive: true, force: true });
      await store.writeAll([{ nm: 'B' }]);

      expect(await store.readAll()).toEqual([{ nm: 'B' }]);
    });
  });
});
