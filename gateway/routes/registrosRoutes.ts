/**
 * Rotas do caderno de saidas.
 *
 * POST /registros faz cadastro ou confirmacao de entrega conforme o id:
 * sem id (ou id "0") cadastra, com id confirma a entrega daquele registro.
 */

import { FastifyPluginAsync } from 'fastify';

import '../contexto';

import {
  CampoCadastroSaida,
  CampoOpaco,
  ConfirmacaoEntregaInput,
  DadosSaida,
  isCampoOpaco,
  isListaDeTextos,
  isObjeto
} from '../../entidades/tipos';
import { DadosInvalidosError } from '../../entidades/CadernoErrors';

type Corpo = { [campo: string]: unknown };

// ════════════════════════════════════════════════════════════════════════════
// LEITURA DO CORPO
// ════════════════════════════════════════════════════════════════════════════

/**
 * Retorna o id a atualizar, ou null para cadastro.
 */
function idParaAtualizacao(valor: unknown): string | null {
  if (valor === undefined || valor === null) {
    return null;
  }
  if (!isCampoOpaco(valor)) {
    throw new DadosInvalidosError('Campo id deve ser texto ou número.');
  }
  const id = String(valor);
  return id === '0' ? null : id;
}

function campoObrigatorio(corpo: Corpo, nome: CampoCadastroSaida): CampoOpaco {
  const valor = corpo[nome];
  if (valor === undefined || valor === null) {
    throw new DadosInvalidosError(`Campo obrigatório ausente: ${nome}.`);
  }
  if (!isCampoOpaco(valor)) {
    throw new DadosInvalidosError(`Campo ${nome} deve ser texto ou número.`);
  }
  return valor;
}

function lerDadosSaida(corpo: Corpo): DadosSaida {
  return {
    nm_saida: campoObrigatorio(corpo, 'nm_saida'),
    descricao_saida: campoObrigatorio(corpo, 'descricao_saida'),
    quantidade_saida: campoObrigatorio(corpo, 'quantidade_saida'),
    destino_saida: campoObrigatorio(corpo, 'destino_saida'),
    responsavel_entrega: campoObrigatorio(corpo, 'responsavel_entrega'),
    data_doc_saida: campoObrigatorio(corpo, 'data_doc_saida'),
    deposito_saida: campoObrigatorio(corpo, 'deposito_saida'),
    num_doc_saida: campoObrigatorio(corpo, 'num_doc_saida'),
    item_saida: campoObrigatorio(corpo, 'item_saida')
  };
}

function textoOpcional(corpo: Corpo, nome: string): string | undefined {
  const valor = corpo[nome];
  if (valor === undefined || valor === null) {
    return undefined;
  }
  if (typeof valor !== 'string') {
    throw new DadosInvalidosError(`Campo ${nome} deve ser texto.`);
  }
  return valor;
}

function lerConfirmacao(corpo: Corpo): ConfirmacaoEntregaInput {
  const confirmacao: ConfirmacaoEntregaInput = {
    data_coleta: textoOpcional(corpo, 'data_coleta'),
    nome_motorista: textoOpcional(corpo, 'nome_motorista'),
    nota_fiscal: textoOpcional(corpo, 'nota_fiscal')
  };

  if ('anexos' in corpo) {
    const anexos = corpo.anexos;
    if (!isListaDeTextos(anexos)) {
      throw new DadosInvalidosError('Campo anexos deve ser uma lista de nomes de arquivo.');
    }
    confirmacao.anexos = anexos;
  }

  return confirmacao;
}

// ════════════════════════════════════════════════════════════════════════════
// PLUGIN
// ════════════════════════════════════════════════════════════════════════════

export const registrosRoutes: FastifyPluginAsync = async (app) => {
  /**
   * GET /api/registros
   */
  app.get('/registros', async () => {
    return app.registros.listar();
  });

  /**
   * POST /api/registros
   * 201 no cadastro, 200 na confirmacao de entrega
   */
  app.post<{ Body: unknown }>('/registros', async (request, reply) => {
    const corpo = request.body;
    if (!isObjeto(corpo)) {
      throw new DadosInvalidosError('O corpo da requisição deve ser um objeto JSON.');
    }

    const id = idParaAtualizacao(corpo.id);

    if (id !== null) {
      await app.registros.confirmarEntrega(id, lerConfirmacao(corpo));
      return reply.code(200).send({ message: `Registro ${id} atualizado com sucesso.` });
    }

    const novo = await app.registros.criar(lerDadosSaida(corpo));
    request.log.info({ id: novo.id, num_doc_saida: novo.num_doc_saida, item_saida: novo.item_saida }, 'Registro cadastrado');
    return reply.code(201).send({ message: 'Registro cadastrado com sucesso!', id: novo.id });
  });

  /**
   * DELETE /api/registros
   * Exclusao individual nao existe; registros so saem pelo reset
   */
  app.delete('/registros', async (_request, reply) => {
    return reply.code(501).send({ message: 'Ainda não implementado' });
  });
};
