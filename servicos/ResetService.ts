import { RegistroRepository } from '../repositorios/interfaces/RegistroRepository';
import { ReferenciaRepository } from '../repositorios/interfaces/ReferenciaRepository';
import { UploadStore } from './UploadStore';
import { mensagemDeErro } from '../utilitarios/JsonFileStore';

interface ResultadoReset {
  arquivosRemovidos: number;
}

/**
 * Limpa registros, referencias e anexos enviados.
 */
class ResetService {
  constructor(
    private readonly registros: RegistroRepository,
    private readonly referencias: ReferenciaRepository,
    private readonly uploads: UploadStore
  ) {}

  async resetar(): Promise<ResultadoReset> {
    try {
      await this.registros.limpar();
      await this.referencias.limpar();
      const arquivosRemovidos = await this.uploads.limpar();
      return { arquivosRemovidos };
    } catch (error) {
      throw new Error(`Falha ao resetar os dados: ${mensagemDeErro(error)}`);
    }
  }
}

export { ResetService, ResultadoReset };
