/**
 * Gateway HTTP do caderno de saidas.
 *
 * Re-exporta componentes principais para uso externo.
 */

// Config
export {
  GatewayConfig,
  CaminhosDados,
  loadConfig,
  validateConfig,
  resolverCaminhos,
  DEFAULT_CONFIG
} from './GatewayConfig';

// App factory
export { buildApp, BuildAppOptions } from './app';
export { getAppContext, AppContext } from './contexto';

// Plugins
export { requestIdPlugin, RequestIdPluginOptions, errorHandlerPlugin } from './plugins';

// Routes
export {
  healthRoutes,
  registrosRoutes,
  referenciasRoutes,
  uploadRoutes,
  resetRoutes
} from './routes';
