import * as fs from 'fs/promises';
import * as path from 'path';

import { ValorJson } from '../entidades/tipos';

/**
 * Logger minimo aceito pelos stores e servicos.
 * O logger do Fastify (pino) satisfaz esta interface.
 */
interface StoreLogger {
  warn(obj: object, msg: string): void;
}

interface JsonFileStoreOptions {
  logger: StoreLogger;
}

/**
 * Store generico para persistencia de uma lista em arquivo JSON
 * - Escrita atomica (via .tmp + rename)
 * - Controle de concorrencia via fila interna
 * - .tmp deixado por crash e recuperado uma vez, antes de qualquer leitura ou escrita
 * - Arquivo ausente ou JSON invalido equivalem a lista vazia
 * - Itens sao devolvidos como estao no disco; quem le decide o que reconhece
 */
class JsonFileStore {
  private writeChain: Promise<void>;
  private readonly recuperacao: Promise<void>;
  private readonly logger: StoreLogger;

  constructor(readonly filePath: string, options: JsonFileStoreOptions) {
    this.logger = options.logger;
    this.recuperacao = this.recuperarTmp();
    // Escritas esperam a recuperacao; uma falha nela chega ao chamador via readAll
    this.writeChain = this.recuperacao.catch(() => undefined);
  }

  /**
   * Le todos os itens do arquivo.
   * Retorna array vazio se o arquivo nao existe ou esta corrompido.
   */
  async readAll(): Promise<ValorJson[]> {
    await this.recuperacao;

    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isNodeError(error) && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      this.logger.warn(
        { arquivo: this.filePath, erro: mensagemDeErro(error) },
        'Arquivo vazio ou invalido. Iniciando com lista vazia.'
      );
      return [];
    }

    if (!isListaJson(parsed)) {
      this.logger.warn(
        { arquivo: this.filePath },
        'Arquivo nao contem uma lista. Iniciando com lista vazia.'
      );
      return [];
    }

    return parsed;
  }

  /**
   * Escreve todos os itens no arquivo
   * - Escrita atomica: escreve em .tmp e depois renomeia
   * - Fila interna para evitar escritas intercaladas
   * - Propaga erros sem envenenar a fila
   */
  async writeAll(items: readonly unknown[]): Promise<void> {
    const dir = path.dirname(this.filePath);
    const tmpPath = this.filePath + '.tmp';

    const escrita = this.writeChain.then(async () => {
      await fs.mkdir(dir, { recursive: true });
      await fs.writeFile(tmpPath, JSON.stringify(items, null, 4), 'utf-8');
      await fs.rename(tmpPath, this.filePath);
    });

    // A fila segue mesmo que esta escrita falhe; o erro vai para o chamador.
    this.writeChain = escrita.catch(() => undefined);

    return escrita;
  }

  /**
   * Promove um .tmp deixado por crash durante o rename, se o arquivo principal sumiu.
   */
  private async recuperarTmp(): Promise<void> {
    try {
      await fs.access(this.filePath);
      return;
    } catch (error) {
      if (!isNodeError(error) || error.code !== 'ENOENT') {
        throw error;
      }
    }

    try {
      await fs.rename(this.filePath + '.tmp', this.filePath);
    } catch (error) {
      if (isNodeError(error) && error.code === 'ENOENT') {
        return;
      }
      throw error;
    }

    this.logger.warn({ arquivo: this.filePath }, 'Arquivo recuperado de .tmp');
  }
}

/**
 * JSON.parse so produz valores JSON; basta confirmar que e uma lista.
 */
function isListaJson(valor: unknown): valor is ValorJson[] {
  return Array.isArray(valor);
}

/**
 * Extrai a mensagem de um valor lancado.
 */
function mensagemDeErro(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

/**
 * Erros do fs sao reconhecidos pelo formato: sob o Jest eles vem de outro
 * realm e nao passam em `instanceof Error`.
 */
function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error;
}

export { JsonFileStore, JsonFileStoreOptions, StoreLogger, isNodeError, mensagemDeErro };
