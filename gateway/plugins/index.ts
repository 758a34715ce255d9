/**
 * Re-exporta os plugins do gateway.
 */

export { requestIdPlugin, RequestIdPluginOptions } from './requestIdPlugin';
export { errorHandlerPlugin } from './errorHandlerPlugin';
