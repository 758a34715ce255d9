import { Armazenado, Referencia } from '../../entidades/tipos';

interface ReferenciaRepository {
  listar(): Promise<Armazenado<Referencia>[]>;

  /**
   * Insere ou substitui referencias pelo nm.
   * Existentes mantem a posicao, novas vao para o fim.
   * Itens sem nm em texto ficam como estao.
   * Se o lote repete um nm, vale a ultima ocorrencia.
   * @returns Lista completa apos a mesclagem
   */
  upsertEmMassa(referencias: readonly Referencia[]): Promise<Armazenado<Referencia>[]>;

  /**
   * Remove todas as entradas com o nm informado
   * @returns Quantidade removida
   * @throws ReferenciaNaoEncontradaError se nenhuma entrada tinha o nm
   */
  remover(nm: string): Promise<number>;

  limpar(): Promise<void>;
}

export { ReferenciaRepository };
