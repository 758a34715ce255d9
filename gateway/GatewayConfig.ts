/**
 * Configuracao do gateway HTTP do caderno de saidas.
 */

import * as path from 'path';

// ════════════════════════════════════════════════════════════════════════════
// TIPOS
// ════════════════════════════════════════════════════════════════════════════

const NODE_ENVS = ['development', 'production', 'test'] as const;
const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace'] as const;

type NodeEnv = typeof NODE_ENVS[number];
type LogLevel = typeof LOG_LEVELS[number];

export interface GatewayConfig {
  /**
   * Porta HTTP (default: 5000)
   */
  port: number;

  /**
   * Host para bind (default: '0.0.0.0')
   */
  host: string;

  /**
   * Diretorio base; caminhos relativos abaixo sao resolvidos a partir dele
   */
  dataDir: string;

  registrosFile: string;
  referenciasFile: string;
  uploadsDir: string;

  /**
   * Origens CORS permitidas (default: ['*'])
   */
  corsOrigins: string[];

  /**
   * Tamanho maximo de um upload em bytes; null = sem limite
   */
  uploadMaxBytes: number | null;

  nodeEnv: NodeEnv;
  logLevel: LogLevel;
}

/**
 * Caminhos absolutos derivados da configuracao.
 */
export interface CaminhosDados {
  registrosFile: string;
  referenciasFile: string;
  uploadsDir: string;
}

// ════════════════════════════════════════════════════════════════════════════
// DEFAULTS
// ════════════════════════════════════════════════════════════════════════════

const DEFAULT_CONFIG: GatewayConfig = {
  port: 5000,
  host: '0.0.0.0',
  dataDir: '.',
  registrosFile: 'caderno_ptm_db.json',
  referenciasFile: 'referencias.json',
  uploadsDir: 'uploads',
  corsOrigins: ['*'],
  uploadMaxBytes: null,
  nodeEnv: 'development',
  logLevel: 'info'
};

// ════════════════════════════════════════════════════════════════════════════
// LOADER
// ════════════════════════════════════════════════════════════════════════════

function isNodeEnv(valor: string): valor is NodeEnv {
  return NODE_ENVS.some(e => e === valor);
}

function isLogLevel(valor: string): valor is LogLevel {
  return LOG_LEVELS.some(l => l === valor);
}

function parseInteiro(nome: string, valor: string): number {
  if (!/^\d+$/.test(valor.trim())) {
    throw new Error(`${nome} must be a non-negative integer, got "${valor}"`);
  }
  return parseInt(valor, 10);
}

/**
 * Carrega configuracao do ambiente.
 * Variaveis de ambiente:
 * - PORT
 * - HOST
 * - CADERNO_DATA_DIR
 * - CADERNO_REGISTROS_FILE
 * - CADERNO_REFERENCIAS_FILE
 * - CADERNO_UPLOADS_DIR
 * - CADERNO_CORS_ORIGINS (comma-separated)
 * - CADERNO_UPLOAD_MAX_BYTES
 * - NODE_ENV
 * - CADERNO_LOG_LEVEL
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): GatewayConfig {
  const nodeEnv = env.NODE_ENV || DEFAULT_CONFIG.nodeEnv;
  if (!isNodeEnv(nodeEnv)) {
    throw new Error(`Invalid NODE_ENV: ${nodeEnv}`);
  }

  const logLevel = env.CADERNO_LOG_LEVEL || DEFAULT_CONFIG.logLevel;
  if (!isLogLevel(logLevel)) {
    throw new Error(`Invalid CADERNO_LOG_LEVEL: ${logLevel}`);
  }

  const corsOriginsEnv = env.CADERNO_CORS_ORIGINS;
  const corsOrigins = corsOriginsEnv
    ? corsOriginsEnv.split(',').map(s => s.trim()).filter(s => s.length > 0)
    : DEFAULT_CONFIG.corsOrigins;

  return {
    port: env.PORT ? parseInteiro('PORT', env.PORT) : DEFAULT_CONFIG.port,
    host: env.HOST || DEFAULT_CONFIG.host,
    dataDir: env.CADERNO_DATA_DIR || DEFAULT_CONFIG.dataDir,
    registrosFile: env.CADERNO_REGISTROS_FILE || DEFAULT_CONFIG.registrosFile,
    referenciasFile: env.CADERNO_REFERENCIAS_FILE || DEFAULT_CONFIG.referenciasFile,
    uploadsDir: env.CADERNO_UPLOADS_DIR || DEFAULT_CONFIG.uploadsDir,
    corsOrigins,
    uploadMaxBytes: env.CADERNO_UPLOAD_MAX_BYTES
      ? parseInteiro('CADERNO_UPLOAD_MAX_BYTES', env.CADERNO_UPLOAD_MAX_BYTES)
      : DEFAULT_CONFIG.uploadMaxBytes,
    nodeEnv,
    logLevel
  };
}

/**
 * Valida a configuracao carregada.
 * @throws Error se a configuracao for invalida
 */
export function validateConfig(config: GatewayConfig): void {
  if (!Number.isInteger(config.port) || config.port < 0 || config.port > 65535) {
    throw new Error(`Invalid port: ${config.port}`);
  }

  if (!config.dataDir) {
    throw new Error('dataDir is required');
  }

  if (!config.registrosFile || !config.referenciasFile || !config.uploadsDir) {
    throw new Error('registrosFile, referenciasFile and uploadsDir are required');
  }

  if (path.resolve(config.dataDir, config.registrosFile) === path.resolve(config.dataDir, config.referenciasFile)) {
    throw new Error('registrosFile and referenciasFile must be different files');
  }

  if (config.uploadMaxBytes !== null && config.uploadMaxBytes < 1) {
    throw new Error(`Invalid uploadMaxBytes: ${config.uploadMaxBytes}`);
  }
}

/**
 * Resolve arquivos e diretorio de uploads contra dataDir.
 */
export function resolverCaminhos(config: GatewayConfig): CaminhosDados {
  return {
    registrosFile: path.resolve(config.dataDir, config.registrosFile),
    referenciasFile: path.resolve(config.dataDir, config.referenciasFile),
    uploadsDir: path.resolve(config.dataDir, config.uploadsDir)
  };
}

export { DEFAULT_CONFIG, NodeEnv, LogLevel };
