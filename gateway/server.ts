#!/usr/bin/env node
/**
 * Entrypoint do gateway HTTP do caderno de saidas.
 *
 * Uso:
 *   npm run dev            (ts-node, direto das fontes)
 *   npm run build && npm start
 *
 * Variaveis de ambiente: ver loadConfig() em GatewayConfig.ts
 */

import { loadConfig, validateConfig } from './GatewayConfig';
import { buildApp } from './app';

async function main(): Promise<void> {
  const config = loadConfig();
  validateConfig(config);

  const app = await buildApp({ config });

  app.log.info(
    {
      port: config.port,
      dataDir: config.dataDir,
      registrosFile: config.registrosFile,
      referenciasFile: config.referenciasFile,
      uploadsDir: config.uploadsDir,
      env: config.nodeEnv
    },
    'Configuration loaded'
  );

  const shutdown = async (signal: string): Promise<void> => {
    app.log.info(`${signal} received, shutting down...`);
    await app.close();
    process.exit(0);
  };

  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });
  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });

  try {
    await app.listen({
      port: config.port,
      host: config.host
    });
  } catch (error) {
    app.log.error({ err: error }, 'Failed to start server');
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
