import { JsonFileStore, StoreLogger } from '../../utilitarios/JsonFileStore';
import { ReferenciaRepository } from '../interfaces/ReferenciaRepository';
import { Armazenado, Referencia, ValorJson, isObjetoJson } from '../../entidades/tipos';
import { ReferenciaNaoEncontradaError } from '../../entidades/CadernoErrors';

/**
 * Chave de mesclagem: o nm em texto. Itens sem nm em texto ficam
 * na sua posicao e nunca sao mesclados.
 */
function chaveDoItem(item: ValorJson, posicao: number): string {
  if (isObjetoJson(item) && typeof item.nm === 'string') {
    return `nm:${item.nm}`;
  }
  return `#${posicao}`;
}

function temNm(item: ValorJson, nm: string): boolean {
  return isObjetoJson(item) && item.nm === nm;
}

/**
 * Tabela de referencias NM persistida em arquivo JSON.
 */
class ReferenciaRepositoryImpl implements ReferenciaRepository {
  private store: JsonFileStore;
  private persistLock: Promise<void> = Promise.resolve();

  constructor(filePath: string, logger: StoreLogger) {
    this.store = new JsonFileStore(filePath, { logger });
  }

  private withLock<T>(operation: () => Promise<T>): Promise<T> {
    const resultado = this.persistLock.then(operation);
    this.persistLock = resultado.then(() => undefined, () => undefined);
    return resultado;
  }

  async listar(): Promise<Armazenado<Referencia>[]> {
    return this.store.readAll();
  }

  async upsertEmMassa(referencias: readonly Referencia[]): Promise<Armazenado<Referencia>[]> {
    return this.withLock(async () => {
      const porChave = new Map<string, Armazenado<Referencia>>();
      (await this.store.readAll()).forEach((item, posicao) => {
        porChave.set(chaveDoItem(item, posicao), item);
      });

      // Map.set em chave existente mantem a posicao da primeira insercao
      for (const ref of referencias) {
        porChave.set(`nm:${ref.nm}`, ref);
      }

      const mescladas = Array.from(porChave.values());
      await this.store.writeAll(mescladas);
      return mescladas;
    });
  }

  async remover(nm: string): Promise<number> {
    return this.withLock(async () => {
      const itens = await this.store.readAll();
      const restantes = itens.filter(item => !temNm(item, nm));
      const removidas = itens.length - restantes.length;

      if (removidas === 0) {
        throw new ReferenciaNaoEncontradaError(nm);
      }

      await this.store.writeAll(restantes);
      return removidas;
    });
  }

  async limpar(): Promise<void> {
    return this.withLock(() => this.store.writeAll([]));
  }
}

export { ReferenciaRepositoryImpl };
