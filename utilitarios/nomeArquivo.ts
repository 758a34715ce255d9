/**
 * Reduz um nome de arquivo enviado pelo cliente a um nome seguro para o disco.
 *
 * - Normaliza (NFKD) e descarta caracteres nao ASCII ("ação" -> "acao")
 * - Separadores de caminho viram espaco, espacos viram "_"
 * - Mantem apenas [A-Za-z0-9_.-]
 * - Remove "." e "_" das pontas (sem arquivos ocultos nem "..")
 *
 * Pode retornar string vazia; o chamador decide o que fazer.
 */
export function sanitizarNomeArquivo(nome: string): string {
  const ascii = nome.normalize('NFKD').replace(/[^\x00-\x7f]/g, '');
  const semSeparadores = ascii.replace(/[/\\]/g, ' ');
  const comUnderscore = semSeparadores.trim().split(/\s+/).join('_');
  return comUnderscore
    .replace(/[^A-Za-z0-9_.-]/g, '')
    .replace(/^[._]+|[._]+$/g, '');
}

/**
 * Nome unico: segundos Unix + "_" + nome sanitizado.
 */
export function nomeUnico(nomeSanitizado: string, agoraMs: number = Date.now()): string {
  return `${Math.floor(agoraMs / 1000)}_${nomeSanitizado}`;
}
