import { FastifyPluginAsync } from 'fastify';

import '../contexto';

export const resetRoutes: FastifyPluginAsync = async (app) => {
  /**
   * DELETE /api/reset
   * Apaga registros, referencias e todos os arquivos enviados
   */
  app.delete('/reset', async (request, reply) => {
    const resultado = await app.resetService.resetar();
    request.log.warn(resultado, 'Caderno resetado');
    return reply.code(200).send({
      message: 'Todos os registros, referências e arquivos de uploads foram limpos.'
    });
  });
};
