/**
 * Erros de dominio do caderno de saidas.
 *
 * Cada erro carrega o status HTTP com que o gateway o responde.
 */

// ════════════════════════════════════════════════════════════════════════════
// CLASSE BASE
// ════════════════════════════════════════════════════════════════════════════

class CadernoError extends Error {
  readonly code: string;
  readonly statusCode: number;

  constructor(message: string, code: string, statusCode: number) {
    super(message);
    this.name = 'CadernoError';
    this.code = code;
    this.statusCode = statusCode;
  }
}

// ════════════════════════════════════════════════════════════════════════════
// ERROS ESPECIFICOS
// ════════════════════════════════════════════════════════════════════════════

class RegistroNaoEncontradoError extends CadernoError {
  readonly registroId: string;

  constructor(registroId: string) {
    super('Registro não encontrado para atualização.', 'REGISTRO_NAO_ENCONTRADO', 404);
    this.name = 'RegistroNaoEncontradoError';
    this.registroId = registroId;
  }
}

/**
 * Par (N° Doc, Item) ja cadastrado.
 */
class RegistroDuplicadoError extends CadernoError {
  constructor(numDoc: string | number, item: string | number) {
    super(
      `O par N° Doc (${numDoc}) e Item (${item}) já existe no cadastro.`,
      'REGISTRO_DUPLICADO',
      409
    );
    this.name = 'RegistroDuplicadoError';
  }
}

class ReferenciaNaoEncontradaError extends CadernoError {
  constructor(nm: string) {
    super(`Referência ${nm} não encontrada.`, 'REFERENCIA_NAO_ENCONTRADA', 404);
    this.name = 'ReferenciaNaoEncontradaError';
  }
}

/**
 * Corpo da requisicao incompleto ou com tipo errado.
 */
class DadosInvalidosError extends CadernoError {
  constructor(message: string) {
    super(message, 'DADOS_INVALIDOS', 400);
    this.name = 'DadosInvalidosError';
  }
}

/**
 * Upload sem arquivo ou com nome inutilizavel.
 */
class ArquivoInvalidoError extends CadernoError {
  constructor(message: string) {
    super(message, 'ARQUIVO_INVALIDO', 400);
    this.name = 'ArquivoInvalidoError';
  }
}

class ArquivoMuitoGrandeError extends CadernoError {
  constructor(limiteBytes: number) {
    super(`Arquivo excede o limite de ${limiteBytes} bytes.`, 'ARQUIVO_MUITO_GRANDE', 413);
    this.name = 'ArquivoMuitoGrandeError';
  }
}

// ════════════════════════════════════════════════════════════════════════════
// CODIGOS
// ════════════════════════════════════════════════════════════════════════════

const CADERNO_ERRO = {
  REGISTRO_NAO_ENCONTRADO: 'REGISTRO_NAO_ENCONTRADO',
  REGISTRO_DUPLICADO: 'REGISTRO_DUPLICADO',
  REFERENCIA_NAO_ENCONTRADA: 'REFERENCIA_NAO_ENCONTRADA',
  DADOS_INVALIDOS: 'DADOS_INVALIDOS',
  ARQUIVO_INVALIDO: 'ARQUIVO_INVALIDO',
  ARQUIVO_MUITO_GRANDE: 'ARQUIVO_MUITO_GRANDE'
} as const;

export {
  CadernoError,
  RegistroNaoEncontradoError,
  RegistroDuplicadoError,
  ReferenciaNaoEncontradaError,
  DadosInvalidosError,
  ArquivoInvalidoError,
  ArquivoMuitoGrandeError,
  CADERNO_ERRO
};
