/**
 * Testes HTTP de /api/referencias.
 */

import { FastifyInstance } from 'fastify';

import { createTestDataDir, TestDataDir } from '../helpers/testDataDir';
import { buildTestApp } from '../helpers/appTeste';

describe('Rotas de referencias', () => {
  let testDir: TestDataDir;
  let app: FastifyInstance;

  beforeEach(async () => {
    testDir = await createTestDataDir('rotas-referencias');
    app = await buildTestApp(testDir.dir);
  });

  afterEach(async () => {
    await app.close();
    await testDir.cleanup();
  });

  async function listar(): Promise<unknown[]> {
    const response = await app.inject({ method: 'GET', url: '/api/referencias' });
    expect(response.statusCode).toBe(200);
    return response.json();
  }

  function enviar(payload: object) {
    return app.inject({ method: 'POST', url: '/api/referencias', payload });
  }

  test('POST faz upsert por nm', async () => {
    await enviar({
      referencias: [
        { nm: 'NM-1', descricao: 'Parafuso', unidade: 'UN' },
        { nm: 'NM-2', descricao: 'Porca' }
      ]
    });

    const response = await enviar({
      referencias: [
        { nm: 'NM-3', descricao: 'Rebite' },
        { nm: 'NM-1', descricao: 'Parafuso M8' }
      ]
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ message: 'Referências atualizadas com sucesso!' });
    expect(await listar()).toEqual([
      { nm: 'NM-1', descricao: 'Parafuso M8' },
      { nm: 'NM-2', descricao: 'Porca' },
      { nm: 'NM-3', descricao: 'Rebite' }
    ]);
  });

  test('POST sem chave referencias retorna 400', async () => {
    const response = await enviar({ itens: [] });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({ error: "Campo 'referencias' ausente." });
  });

  test('POST com referencias que nao e lista retorna 400', async () => {
    const response = await enviar({ referencias: { nm: 'NM-1' } });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({ error: "Campo 'referencias' deve ser uma lista." });
  });

  test('item sem nm rejeita o lote inteiro', async () => {
    await enviar({ referencias: [{ nm: 'NM-1' }] });

    const response = await enviar({ referencias: [{ nm: 'NM-2' }, { descricao: 'sem codigo' }] });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({ error: 'Referência na posição 1 sem campo nm (texto).' });
    expect(await listar()).toEqual([{ nm: 'NM-1' }]);
  });

  test('DELETE remove apenas o nm informado', async () => {
    await enviar({ referencias: [{ nm: 'NM 001' }, { nm: 'NM-2' }] });

    const response = await app.inject({ method: 'DELETE', url: '/api/referencias/NM%20001' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ message: 'Referência NM 001 removida.' });
    expect(await listar()).toEqual([{ nm: 'NM-2' }]);
  });

  test('DELETE de nm desconhecido retorna 404', async () => {
    await enviar({ referencias: [{ nm: 'NM-1' }] });

    const response = await app.inject({ method: 'DELETE', url: '/api/referencias/ZZ' });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({ error: 'Referência ZZ não encontrada.' });
    expect(await listar()).toEqual([{ nm: 'NM-1' }]);
  });
});
