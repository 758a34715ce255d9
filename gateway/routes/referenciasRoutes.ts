/**
 * Rotas da tabela de referencias NM.
 */

import { FastifyPluginAsync } from 'fastify';

import '../contexto';

import { Referencia, isObjeto, isReferencia } from '../../entidades/tipos';
import { DadosInvalidosError } from '../../entidades/CadernoErrors';

interface NmParams {
  nm: string;
}

function lerReferencias(corpo: unknown): Referencia[] {
  if (!isObjeto(corpo) || !('referencias' in corpo)) {
    throw new DadosInvalidosError("Campo 'referencias' ausente.");
  }

  const lista: unknown = corpo.referencias;
  if (!Array.isArray(lista)) {
    throw new DadosInvalidosError("Campo 'referencias' deve ser uma lista.");
  }

  return lista.map((item: unknown, posicao: number) => {
    if (!isReferencia(item)) {
      throw new DadosInvalidosError(`Referência na posição ${posicao} sem campo nm (texto).`);
    }
    return item;
  });
}

export const referenciasRoutes: FastifyPluginAsync = async (app) => {
  /**
   * GET /api/referencias
   */
  app.get('/referencias', async () => {
    return app.referencias.listar();
  });

  /**
   * POST /api/referencias
   * Upsert em massa por nm: { referencias: [...] }
   */
  app.post<{ Body: unknown }>('/referencias', async (request, reply) => {
    const referencias = lerReferencias(request.body);
    const total = await app.referencias.upsertEmMassa(referencias);
    request.log.info({ recebidas: referencias.length, total: total.length }, 'Referencias atualizadas');
    return reply.code(200).send({ message: 'Referências atualizadas com sucesso!' });
  });

  /**
   * DELETE /api/referencias/:nm
   */
  app.delete<{ Params: NmParams }>('/referencias/:nm', async (request, reply) => {
    const { nm } = request.params;
    await app.referencias.remover(nm);
    return reply.code(200).send({ message: `Referência ${nm} removida.` });
  });
};
