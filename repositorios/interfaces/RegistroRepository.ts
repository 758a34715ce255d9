import { Armazenado, ConfirmacaoEntregaInput, DadosSaida, ObjetoJson, Registro } from '../../entidades/tipos';

interface RegistroRepository {
  /**
   * Lista todos os registros, na ordem de cadastro, como estao no arquivo
   */
  listar(): Promise<Armazenado<Registro>[]>;

  /**
   * Cadastra uma nova saida
   * id = maior id inteiro existente + 1 (1 com o caderno vazio)
   * Confirmacao inicia como Pendente, sem motorista, nota ou anexos
   * @throws RegistroDuplicadoError se o par (num_doc_saida, item_saida) ja existe
   */
  criar(dados: DadosSaida): Promise<Registro>;

  /**
   * Confirma a entrega de um registro existente.
   * Altera apenas data_coleta, nome_motorista, nota_fiscal e, se informado, anexos.
   * O id e comparado como texto.
   * @returns O registro gravado, com os demais campos como estavam
   * @throws RegistroNaoEncontradoError se nao ha registro com o id
   */
  confirmarEntrega(id: string, confirmacao: ConfirmacaoEntregaInput): Promise<ObjetoJson>;

  /**
   * Remove todos os registros
   */
  limpar(): Promise<void>;

  /**
   * DELETE individual NAO EXISTE
   */
}

export { RegistroRepository };
