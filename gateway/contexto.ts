/**
 * Dependencias decoradas na instancia Fastify.
 * Rotas importam este modulo para enxergar os decorators.
 */

import { FastifyInstance } from 'fastify';

import { RegistroRepository } from '../repositorios/interfaces/RegistroRepository';
import { ReferenciaRepository } from '../repositorios/interfaces/ReferenciaRepository';
import { UploadStore } from '../servicos/UploadStore';
import { ResetService } from '../servicos/ResetService';

declare module 'fastify' {
  interface FastifyInstance {
    registros: RegistroRepository;
    referencias: ReferenciaRepository;
    uploads: UploadStore;
    resetService: ResetService;
  }
}

export interface AppContext {
  registros: RegistroRepository;
  referencias: ReferenciaRepository;
  uploads: UploadStore;
}

/**
 * Retorna o contexto do app (repositorios e uploads)
 */
export function getAppContext(app: FastifyInstance): AppContext {
  return {
    registros: app.registros,
    referencias: app.referencias,
    uploads: app.uploads
  };
}
