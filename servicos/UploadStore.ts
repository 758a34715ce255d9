import * as fs from 'fs/promises';
import { createWriteStream } from 'fs';
import * as path from 'path';
import { pipeline } from 'stream/promises';
import { Readable } from 'stream';

import { ArquivoEnviado } from '../entidades/tipos';
import { ArquivoInvalidoError } from '../entidades/CadernoErrors';
import { StoreLogger, isNodeError, mensagemDeErro } from '../utilitarios/JsonFileStore';
import { nomeUnico, sanitizarNomeArquivo } from '../utilitarios/nomeArquivo';

/**
 * Diretorio de anexos enviados.
 *
 * Arquivos so saem daqui pelo reset; nenhum registro os remove.
 */
class UploadStore {
  constructor(
    readonly diretorio: string,
    private readonly logger: StoreLogger
  ) {}

  async garantirDiretorio(): Promise<void> {
    await fs.mkdir(this.diretorio, { recursive: true });
  }

  /**
   * Grava o conteudo sob um nome unico.
   * Os bytes vao para .<nome>.tmp, oculto do servidor estatico, e so
   * assumem o nome final quando completos.
   *
   * @throws ArquivoInvalidoError se o nome sanitizado ficar vazio
   */
  async salvar(nomeOriginal: string, conteudo: Readable): Promise<ArquivoEnviado> {
    const original = sanitizarNomeArquivo(nomeOriginal);
    if (original === '') {
      conteudo.resume();
      throw new ArquivoInvalidoError('Nome de arquivo inválido.');
    }

    const filename = nomeUnico(original);
    const destino = path.join(this.diretorio, filename);
    const tmpPath = path.join(this.diretorio, `.${filename}.tmp`);

    try {
      await this.garantirDiretorio();
      await pipeline(conteudo, createWriteStream(tmpPath));
      await fs.rename(tmpPath, destino);
    } catch (error) {
      await fs.rm(tmpPath, { force: true });
      // Erros do parser multipart (413 etc.) seguem com seu status
      if (temStatusHttp(error)) {
        throw error;
      }
      throw new Error(`Falha ao salvar o arquivo no disco: ${mensagemDeErro(error)}`);
    }

    return { filename, original_name: original };
  }

  async remover(filename: string): Promise<void> {
    await fs.rm(path.join(this.diretorio, path.basename(filename)), { force: true });
  }

  /**
   * Remove todo arquivo regular do diretorio; subdiretorios ficam.
   * Falhas por arquivo sao logadas e puladas.
   *
   * @returns Quantidade de arquivos removidos
   */
  async limpar(): Promise<number> {
    let nomes: string[];
    try {
      nomes = await fs.readdir(this.diretorio);
    } catch (error) {
      if (isNodeError(error) && error.code === 'ENOENT') {
        return 0;
      }
      throw error;
    }

    let removidos = 0;
    for (const nome of nomes) {
      const caminho = path.join(this.diretorio, nome);
      try {
        const info = await fs.stat(caminho);
        if (!info.isFile()) {
          continue;
        }
        await fs.unlink(caminho);
        removidos++;
      } catch (error) {
        this.logger.warn({ arquivo: caminho, erro: mensagemDeErro(error) }, 'Erro ao deletar arquivo');
      }
    }
    return removidos;
  }
}

function temStatusHttp(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'statusCode' in error && typeof error.statusCode === 'number';
}

export { UploadStore };
