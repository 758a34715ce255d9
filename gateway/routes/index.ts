/**
 * Re-exporta todas as rotas do gateway.
 */

export { healthRoutes } from './healthRoutes';
export { registrosRoutes } from './registrosRoutes';
export { referenciasRoutes } from './referenciasRoutes';
export { uploadRoutes, UploadRoutesOptions } from './uploadRoutes';
export { resetRoutes } from './resetRoutes';
