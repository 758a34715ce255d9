import { FastifyInstance } from 'fastify';

import { buildApp } from '../../gateway';
import { DEFAULT_CONFIG, GatewayConfig } from '../../gateway/GatewayConfig';
import { DadosSaida } from '../../entidades/tipos';

export function configTeste(dataDir: string, extra: Partial<GatewayConfig> = {}): GatewayConfig {
  return {
    ...DEFAULT_CONFIG,
    port: 0,
    host: '127.0.0.1',
    dataDir,
    nodeEnv: 'test',
    logLevel: 'fatal',
    ...extra
  };
}

export function buildTestApp(dataDir: string, extra: Partial<GatewayConfig> = {}): Promise<FastifyInstance> {
  return buildApp({ config: configTeste(dataDir, extra) });
}

export function criarDadosSaida(numDoc: string = 'D1', item: string = '1'): DadosSaida {
  return {
    nm_saida: 'NM-100',
    descricao_saida: 'Cabo de cobre 10mm',
    quantidade_saida: '25',
    destino_saida: 'Obra Norte',
    responsavel_entrega: 'Joana',
    data_doc_saida: '2024-03-10',
    deposito_saida: 'DEP-01',
    num_doc_saida: numDoc,
    item_saida: item
  };
}

const BOUNDARY = '----caderno-teste-boundary';

export interface ParteArquivo {
  campo: string;
  nomeArquivo: string;
  conteudo: Buffer;
}

/**
 * Monta um corpo multipart/form-data com as partes de arquivo na ordem dada.
 */
export function corpoMultipartPartes(
  partes: readonly ParteArquivo[]
): { payload: Buffer; headers: Record<string, string> } {
  const payload = Buffer.concat([
    ...partes.flatMap(({ campo, nomeArquivo, conteudo }) => [
      Buffer.from(
        `--${BOUNDARY}\r\n` +
        `Content-Disposition: form-data; name="${campo}"; filename="${nomeArquivo}"\r\n` +
        'Content-Type: application/octet-stream\r\n\r\n'
      ),
      conteudo,
      Buffer.from('\r\n')
    ]),
    Buffer.from(`--${BOUNDARY}--\r\n`)
  ]);

  return {
    payload,
    headers: { 'content-type': `multipart/form-data; boundary=${BOUNDARY}` }
  };
}

export function corpoMultipart(
  campo: string,
  nomeArquivo: string,
  conteudo: Buffer
): { payload: Buffer; headers: Record<string, string> } {
  return corpoMultipartPartes([{ campo, nomeArquivo, conteudo }]);
}
