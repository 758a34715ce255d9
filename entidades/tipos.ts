// ════════════════════════════════════════════════════════════════════════
// VALORES JSON
// ════════════════════════════════════════════════════════════════════════

type ValorJson =
  | string
  | number
  | boolean
  | null
  | ValorJson[]
  | ObjetoJson;

type ObjetoJson = { [campo: string]: ValorJson };

/**
 * Item de um arquivo de dados: no formato atual ou, se gravado por outra
 * versao ou editado a mao, como esta no disco. Nenhum dos dois e descartado.
 */
type Armazenado<T> = T | ValorJson;

/**
 * Campo descritivo fornecido pelo cliente; o sistema nao o interpreta.
 */
type CampoOpaco = string | number;

// ════════════════════════════════════════════════════════════════════════
// CONSTANTES
// ════════════════════════════════════════════════════════════════════════

/** Valor de data_coleta enquanto a entrega nao foi confirmada. */
const DATA_COLETA_PENDENTE = 'Pendente';

/**
 * Campos exigidos no cadastro de uma saida, na ordem em que sao validados.
 */
const CAMPOS_CADASTRO_SAIDA = [
  'nm_saida',
  'descricao_saida',
  'quantidade_saida',
  'destino_saida',
  'responsavel_entrega',
  'data_doc_saida',
  'deposito_saida',
  'num_doc_saida',
  'item_saida'
] as const;

type CampoCadastroSaida = typeof CAMPOS_CADASTRO_SAIDA[number];

// ════════════════════════════════════════════════════════════════════════
// ENTIDADES PRINCIPAIS
// ════════════════════════════════════════════════════════════════════════

/**
 * Dados informados no cadastro de uma saida.
 * O par (num_doc_saida, item_saida) identifica a saida no caderno.
 */
type DadosSaida = Record<CampoCadastroSaida, CampoOpaco>;

/**
 * Campos de confirmacao de entrega, preenchidos depois do cadastro.
 */
interface ConfirmacaoEntrega {
  data_coleta: string;
  nome_motorista: string;
  nota_fiscal: string;
  /** Nomes dos arquivos enviados via upload */
  anexos: string[];
}

/**
 * Registro de saida no caderno.
 */
interface Registro extends DadosSaida, ConfirmacaoEntrega {
  id: number;
}

/**
 * Entrada de confirmacao vinda do cliente.
 * anexos ausente preserva a lista ja salva.
 */
interface ConfirmacaoEntregaInput {
  data_coleta?: string;
  nome_motorista?: string;
  nota_fiscal?: string;
  anexos?: string[];
}

/**
 * Referencia NM -> metadados descritivos.
 */
interface Referencia {
  nm: string;
  [campo: string]: ValorJson;
}

/**
 * Resultado de um upload aceito.
 */
interface ArquivoEnviado {
  /** Nome unico gravado no diretorio de uploads */
  filename: string;
  /** Nome original apos sanitizacao */
  original_name: string;
}

// ════════════════════════════════════════════════════════════════════════
// VALIDADORES
// ════════════════════════════════════════════════════════════════════════

function isObjeto(valor: unknown): valor is { [campo: string]: unknown } {
  return typeof valor === 'object' && valor !== null && !Array.isArray(valor);
}

function isValorJson(valor: unknown): valor is ValorJson {
  if (valor === null) return true;
  switch (typeof valor) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(valor);
    case 'object':
      if (Array.isArray(valor)) return valor.every(isValorJson);
      return Object.values(valor).every(isValorJson);
    default:
      return false;
  }
}

function isCampoOpaco(valor: unknown): valor is CampoOpaco {
  return typeof valor === 'string' || (typeof valor === 'number' && Number.isFinite(valor));
}

function isListaDeTextos(valor: unknown): valor is string[] {
  return Array.isArray(valor) && valor.every(v => typeof v === 'string');
}

function isObjetoJson(valor: ValorJson): valor is ObjetoJson {
  return typeof valor === 'object' && valor !== null && !Array.isArray(valor);
}

function isReferencia(valor: unknown): valor is Referencia {
  return isObjeto(valor) && typeof valor.nm === 'string' && isValorJson(valor);
}

// ════════════════════════════════════════════════════════════════════════
// EXPORTS
// ════════════════════════════════════════════════════════════════════════

export {
  ValorJson,
  ObjetoJson,
  Armazenado,
  CampoOpaco,
  CampoCadastroSaida,
  DadosSaida,
  ConfirmacaoEntrega,
  ConfirmacaoEntregaInput,
  Registro,
  Referencia,
  ArquivoEnviado,
  DATA_COLETA_PENDENTE,
  CAMPOS_CADASTRO_SAIDA,
  isObjeto,
  isObjetoJson,
  isValorJson,
  isCampoOpaco,
  isListaDeTextos,
  isReferencia
};
