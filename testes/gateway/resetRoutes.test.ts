import * as fs from 'fs/promises';
import { FastifyInstance } from 'fastify';

import { getAppContext } from '../../gateway';
import { createTestDataDir, TestDataDir } from '../helpers/testDataDir';
import { buildTestApp, corpoMultipart, criarDadosSaida } from '../helpers/appTeste';

describe('DELETE /api/reset', () => {
  let testDir: TestDataDir;
  let app: FastifyInstance;

  beforeEach(async () => {
    testDir = await createTestDataDir('rotas-reset');
    app = await buildTestApp(testDir.dir);
  });

  afterEach(async () => {
    await app.close();
    await testDir.cleanup();
  });

  test('esvazia registros, referencias e uploads', async () => {
    await app.inject({ method: 'POST', url: '/api/registros', payload: criarDadosSaida('D1', '1') });
    await app.inject({ method: 'POST', url: '/api/referencias', payload: { referencias: [{ nm: 'NM-1' }] } });
    const upload = await app.inject({
      method: 'POST',
      url: '/api/upload',
      ...corpoMultipart('file', 'comprovante.jpg', Buffer.from('jpg'))
    });
    const { filename } = upload.json();

    const response = await app.inject({ method: 'DELETE', url: '/api/reset' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      message: 'Todos os registros, referências e arquivos de uploads foram limpos.'
    });

    const registros = await app.inject({ method: 'GET', url: '/api/registros' });
    const referencias = await app.inject({ method: 'GET', url: '/api/referencias' });
    expect(registros.json()).toEqual([]);
    expect(referencias.json()).toEqual([]);

    const { uploads } = getAppContext(app);
    expect(await fs.readdir(uploads.diretorio)).toEqual([]);

    const download = await app.inject({ method: 'GET', url: `/uploads/${filename}` });
    expect(download.statusCode).toBe(404);
  });

  test('reset com caderno vazio tambem retorna 200', async () => {
    const response = await app.inject({ method: 'DELETE', url: '/api/reset' });

    expect(response.statusCode).toBe(200);
  });

  test('falha ao limpar retorna 500 com a mensagem', async () => {
    const { registros } = getAppContext(app);
    jest.spyOn(registros, 'limpar').mockRejectedValue(new Error('disco cheio'));

    const response = await app.inject({ method: 'DELETE', url: '/api/reset' });

    expect(response.statusCode).toBe(500);
    expect(response.json()).toEqual({ error: 'Falha ao resetar os dados: disco cheio' });
  });
});
