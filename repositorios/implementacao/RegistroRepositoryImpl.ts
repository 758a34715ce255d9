import { JsonFileStore, StoreLogger } from '../../utilitarios/JsonFileStore';
import { RegistroRepository } from '../interfaces/RegistroRepository';
import {
  Armazenado,
  ConfirmacaoEntregaInput,
  DadosSaida,
  DATA_COLETA_PENDENTE,
  ObjetoJson,
  Registro,
  ValorJson,
  isCampoOpaco,
  isObjetoJson
} from '../../entidades/tipos';
import { RegistroDuplicadoError, RegistroNaoEncontradoError } from '../../entidades/CadernoErrors';

// ════════════════════════════════════════════════════════════════════════
// FUNÇÕES AUXILIARES
// ════════════════════════════════════════════════════════════════════════

/**
 * Ids inteiros, numericos ou em texto ("12"), entram no calculo do proximo id.
 */
function idNumerico(item: ValorJson): number | null {
  if (!isObjetoJson(item)) return null;
  const { id } = item;
  if (typeof id === 'number' && Number.isInteger(id)) return id;
  if (typeof id === 'string' && /^\d+$/.test(id)) return Number(id);
  return null;
}

function proximoId(itens: readonly ValorJson[]): number {
  return itens.reduce((maior: number, item) => Math.max(maior, idNumerico(item) ?? 0), 0) + 1;
}

function mesmoPar(item: ValorJson, dados: DadosSaida): boolean {
  return (
    isObjetoJson(item) &&
    item.num_doc_saida === dados.num_doc_saida &&
    item.item_saida === dados.item_saida
  );
}

function comId(item: ValorJson, id: string): item is ObjetoJson {
  return isObjetoJson(item) && isCampoOpaco(item.id) && String(item.id) === id;
}

// ════════════════════════════════════════════════════════════════════════
// IMPLEMENTAÇÃO
// ════════════════════════════════════════════════════════════════════════

/**
 * Registros de saida persistidos em um unico arquivo JSON.
 * Cada operacao le o arquivo inteiro; escritas passam pelo lock.
 * Itens fora do formato atual sao regravados sem alteracao.
 */
class RegistroRepositoryImpl implements RegistroRepository {
  private store: JsonFileStore;
  private persistLock: Promise<void> = Promise.resolve();

  constructor(filePath: string, logger: StoreLogger) {
    this.store = new JsonFileStore(filePath, { logger });
  }

  /**
   * Serializa ciclos leitura-alteracao-escrita neste arquivo.
   */
  private withLock<T>(operation: () => Promise<T>): Promise<T> {
    const resultado = this.persistLock.then(operation);
    this.persistLock = resultado.then(() => undefined, () => undefined);
    return resultado;
  }

  async listar(): Promise<Armazenado<Registro>[]> {
    return this.store.readAll();
  }

  async criar(dados: DadosSaida): Promise<Registro> {
    return this.withLock(async () => {
      const itens = await this.store.readAll();

      if (itens.some(item => mesmoPar(item, dados))) {
        throw new RegistroDuplicadoError(dados.num_doc_saida, dados.item_saida);
      }

      const novo: Registro = {
        id: proximoId(itens),
        nm_saida: dados.nm_saida,
        descricao_saida: dados.descricao_saida,
        quantidade_saida: dados.quantidade_saida,
        destino_saida: dados.destino_saida,
        responsavel_entrega: dados.responsavel_entrega,
        data_doc_saida: dados.data_doc_saida,
        deposito_saida: dados.deposito_saida,
        num_doc_saida: dados.num_doc_saida,
        item_saida: dados.item_saida,

        data_coleta: DATA_COLETA_PENDENTE,
        nome_motorista: '',
        nota_fiscal: '',
        anexos: []
      };

      await this.store.writeAll([...itens, novo]);
      return novo;
    });
  }

  async confirmarEntrega(id: string, confirmacao: ConfirmacaoEntregaInput): Promise<ObjetoJson> {
    return this.withLock(async () => {
      const itens = await this.store.readAll();
      const registro = itens.find((item): item is ObjetoJson => comId(item, id));

      if (!registro) {
        throw new RegistroNaoEncontradoError(id);
      }

      registro.data_coleta = confirmacao.data_coleta ?? DATA_COLETA_PENDENTE;
      registro.nome_motorista = confirmacao.nome_motorista ?? '';
      registro.nota_fiscal = confirmacao.nota_fiscal ?? '';
      if (confirmacao.anexos !== undefined) {
        registro.anexos = [...confirmacao.anexos];
      }

      await this.store.writeAll(itens);
      return registro;
    });
  }

  async limpar(): Promise<void> {
    return this.withLock(() => this.store.writeAll([]));
  }
}

export { RegistroRepositoryImpl };
