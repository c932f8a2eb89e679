/**
 * Utilitarios para normalizacao de UF (sigla de estado)
 */

export const ESTADOS_VALIDOS: ReadonlySet<string> = new Set([
  'AC', 'AL', 'AP', 'AM', 'BA', 'CE', 'DF', 'ES', 'GO',
  'MA', 'MT', 'MS', 'MG', 'PA', 'PB', 'PR', 'PE', 'PI',
  'RJ', 'RN', 'RS', 'RO', 'RR', 'SC', 'SP', 'SE', 'TO',
]);

function normalizar(valor: string | null | undefined): string {
  if (!valor) return '';
  return String(valor).replace(/[^A-Za-z]/g, '').toUpperCase().slice(0, 2);
}

/**
 * Limpa a UF e retorna apenas se for um estado brasileiro valido
 * Entrada: " mg-" -> Saida: "MG"
 * Entrada: "XX"   -> Saida: null
 */
export function limparEstado(valor: string | null | undefined): string | null {
  const limpo = normalizar(valor);
  return ESTADOS_VALIDOS.has(limpo) ? limpo : null;
}

/**
 * Limpa a UF mas devolve o valor mesmo quando invalido (a API do CNA valida)
 */
export function limparEstadoTolerante(valor: string | null | undefined): string | null {
  const limpo = normalizar(valor);
  if (!limpo) return null;

  if (!ESTADOS_VALIDOS.has(limpo)) {
    console.warn(`[Estado] Estado invalido encontrado: '${valor}' -> '${limpo}' (nao e um estado brasileiro valido)`);
  }

  return limpo;
}

/**
 * Extrai a UF do oab_id
 * Entrada: "MG_185929" -> Saida: "MG"
 * Entrada: "xx"        -> Saida: null (sem separador)
 */
export function estadoDoOabId(oabId: string | null | undefined): string | null {
  if (!oabId) return null;

  const separador = oabId.indexOf('_');
  if (separador < 0) return null;

  return limparEstado(oabId.slice(0, separador));
}
