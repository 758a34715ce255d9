/**
 * Factory da instancia Fastify do caderno de saidas.
 * Separado do entrypoint para facilitar testes.
 */

import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import multipart from '@fastify/multipart';
import fastifyStatic from '@fastify/static';
import * as path from 'path';

import { GatewayConfig, resolverCaminhos } from './GatewayConfig';
import './contexto';
import { RegistroRepositoryImpl } from '../repositorios/implementacao/RegistroRepositoryImpl';
import { ReferenciaRepositoryImpl } from '../repositorios/implementacao/ReferenciaRepositoryImpl';
import { UploadStore } from '../servicos/UploadStore';
import { ResetService } from '../servicos/ResetService';

import { requestIdPlugin } from './plugins/requestIdPlugin';
import { errorHandlerPlugin } from './plugins/errorHandlerPlugin';

import { healthRoutes } from './routes/healthRoutes';
import { registrosRoutes } from './routes/registrosRoutes';
import { referenciasRoutes } from './routes/referenciasRoutes';
import { uploadRoutes } from './routes/uploadRoutes';
import { resetRoutes } from './routes/resetRoutes';

// ════════════════════════════════════════════════════════════════════════════
// TIPOS
// ════════════════════════════════════════════════════════════════════════════

export interface BuildAppOptions {
  config: GatewayConfig;
}

const UI_DIR = path.join(__dirname, 'ui');

// ════════════════════════════════════════════════════════════════════════════
// FACTORY
// ════════════════════════════════════════════════════════════════════════════

/**
 * Cria e configura instancia Fastify com todos os plugins e rotas.
 */
export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const { config } = options;
  const caminhos = resolverCaminhos(config);

  const app = Fastify({
    logger: {
      level: config.logLevel
    }
  });

  // ══════════════════════════════════════════════════════════════════════════
  // ARMAZENAMENTO
  // ══════════════════════════════════════════════════════════════════════════

  const registros = new RegistroRepositoryImpl(caminhos.registrosFile, app.log);
  const referencias = new ReferenciaRepositoryImpl(caminhos.referenciasFile, app.log);
  const uploads = new UploadStore(caminhos.uploadsDir, app.log);
  await uploads.garantirDiretorio();

  app.decorate('registros', registros);
  app.decorate('referencias', referencias);
  app.decorate('uploads', uploads);
  app.decorate('resetService', new ResetService(registros, referencias, uploads));

  // ══════════════════════════════════════════════════════════════════════════
  // PLUGINS
  // ══════════════════════════════════════════════════════════════════════════

  await app.register(requestIdPlugin, {
    logMetrics: config.nodeEnv !== 'test'
  });

  await app.register(errorHandlerPlugin);

  await app.register(cors, {
    origin: config.corsOrigins.includes('*') ? '*' : config.corsOrigins,
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS']
  });

  await app.register(multipart, {
    limits: {
      fileSize: config.uploadMaxBytes ?? Number.POSITIVE_INFINITY
    }
  });

  // ══════════════════════════════════════════════════════════════════════════
  // ROTAS
  // ══════════════════════════════════════════════════════════════════════════

  await app.register(healthRoutes);

  // Pagina unica do front-end em GET /
  await app.register(fastifyStatic, {
    root: UI_DIR,
    prefix: '/',
    wildcard: false
  });

  // Anexos enviados; arquivo inexistente ou upload em andamento (.tmp oculto) cai no 404
  await app.register(fastifyStatic, {
    root: caminhos.uploadsDir,
    prefix: '/uploads/',
    decorateReply: false,
    dotfiles: 'ignore'
  });

  await app.register(uploadRoutes, { prefix: '/api', maxBytes: config.uploadMaxBytes });
  await app.register(registrosRoutes, { prefix: '/api' });
  await app.register(referenciasRoutes, { prefix: '/api' });
  await app.register(resetRoutes, { prefix: '/api' });

  return app;
}
