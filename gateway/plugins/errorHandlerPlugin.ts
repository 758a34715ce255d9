/**
 * Traduz erros lancados pelas rotas em respostas JSON { error }.
 *
 * - CadernoError: status do proprio erro
 * - Erros 4xx do Fastify e plugins (JSON malformado, 413, 415): status original
 * - Qualquer outro: 500 com a mensagem da excecao
 */

import { FastifyError, FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';

import { CadernoError } from '../../entidades/CadernoErrors';

function statusDoErro(error: FastifyError): number {
  if (error instanceof CadernoError) {
    return error.statusCode;
  }
  const status = error.statusCode;
  if (typeof status === 'number' && status >= 400 && status < 500) {
    return status;
  }
  return 500;
}

const errorHandlerPluginImpl: FastifyPluginAsync = async (app) => {
  app.setErrorHandler((error: FastifyError, request, reply) => {
    const statusCode = statusDoErro(error);

    if (statusCode >= 500) {
      request.log.error({ err: error }, 'Erro ao processar requisicao');
    } else {
      request.log.info({ code: error.code, statusCode }, error.message);
    }

    return reply.code(statusCode).send({ error: error.message });
  });
};

export const errorHandlerPlugin = fp(errorHandlerPluginImpl, {
  name: 'error-handler-plugin',
  fastify: '5.x',
  dependencies: ['request-id-plugin']
});
