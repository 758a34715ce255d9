/**
 * Upload de anexos (comprovantes de entrega).
 */

import { FastifyPluginAsync } from 'fastify';
import { MultipartFile } from '@fastify/multipart';

import '../contexto';

import { ArquivoEnviado } from '../../entidades/tipos';
import { ArquivoInvalidoError, ArquivoMuitoGrandeError } from '../../entidades/CadernoErrors';
import { UploadStore } from '../../servicos/UploadStore';

const CAMPO_ARQUIVO = 'file';

export interface UploadRoutesOptions {
  /** Limite configurado, usado na mensagem de arquivo truncado */
  maxBytes: number | null;
}

async function salvarParte(
  uploads: UploadStore,
  parte: MultipartFile,
  maxBytes: number | null
): Promise<ArquivoEnviado> {
  if (parte.filename === '') {
    parte.file.resume();
    throw new ArquivoInvalidoError('Nome de arquivo inválido.');
  }

  const salvo = await uploads.salvar(parte.filename, parte.file);

  // Stream cortado no limite de tamanho: descarta o arquivo parcial
  if (parte.file.truncated) {
    await uploads.remover(salvo.filename);
    throw new ArquivoMuitoGrandeError(maxBytes ?? parte.file.bytesRead);
  }

  return salvo;
}

export const uploadRoutes: FastifyPluginAsync<UploadRoutesOptions> = async (app, opts) => {
  /**
   * POST /api/upload
   * multipart/form-data; vale a primeira parte de arquivo chamada "file"
   * 200 { filename, original_name }
   */
  app.post('/upload', async (request, reply) => {
    if (!request.isMultipart()) {
      throw new ArquivoInvalidoError('Nenhum arquivo enviado.');
    }

    let salvo: ArquivoEnviado | undefined;
    for await (const parte of request.files()) {
      if (salvo !== undefined || parte.fieldname !== CAMPO_ARQUIVO) {
        parte.file.resume();
        continue;
      }
      salvo = await salvarParte(app.uploads, parte, opts.maxBytes);
    }

    if (salvo === undefined) {
      throw new ArquivoInvalidoError('Nenhum arquivo enviado.');
    }

    request.log.info({ filename: salvo.filename }, 'Arquivo recebido');
    return reply.code(200).send(salvo);
  });
};
