import { access, readdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';

export interface ResultadoJuncao {
  total: number;
  lidos: string[];
  ignorados: string[];
}

async function existe(caminho: string): Promise<boolean> {
  try {
    await access(caminho);
    return true;
  } catch {
    return false;
  }
}

/**
 * Concatena arrays JSON na ordem dada. Arquivos ausentes ou que nao sao array sao ignorados.
 */
export async function juntarArquivos(arquivos: readonly string[], saida: string): Promise<ResultadoJuncao> {
  const resultado: ResultadoJuncao = { total: 0, lidos: [], ignorados: [] };
  const juntos: unknown[] = [];

  for (const [indice, arquivo] of arquivos.entries()) {
    console.log(`[Juntar] Lendo parte ${indice + 1}: ${path.basename(arquivo)}`);

    if (!(await existe(arquivo))) {
      console.error(`[Juntar] Arquivo nao encontrado: ${arquivo}`);
      resultado.ignorados.push(arquivo);
      continue;
    }

    const dados: unknown = JSON.parse(await readFile(arquivo, 'utf-8'));
    if (!Array.isArray(dados)) {
      console.error(`[Juntar] Arquivo ${arquivo} nao contem um array valido`);
      resultado.ignorados.push(arquivo);
      continue;
    }

    juntos.push(...dados);
    resultado.lidos.push(arquivo);
    console.log(`[Juntar]   ${dados.length} objetos adicionados`);
  }

  await writeFile(saida, JSON.stringify(juntos, null, 2), 'utf-8');
  resultado.total = juntos.length;
  console.log(`[Juntar] Arquivo salvo em: ${saida} (${juntos.length} objetos)`);

  return resultado;
}

/**
 * Acha os arquivos FINAL dos batches que comecam com `prefixo`, em ordem numerica do nome
 * (parte_2 antes de parte_10)
 */
export async function encontrarArquivosFinais(diretorio: string, prefixo: string): Promise<string[]> {
  const inicio = `lawyers_enhanced_${prefixo}`;

  return (await readdir(diretorio))
    .filter((nome) => nome.startsWith(inicio) && nome.includes('_FINAL_') && nome.endsWith('.json'))
    .sort((a, b) => a.localeCompare(b, undefined, { numeric: true }))
    .map((nome) => path.join(diretorio, nome));
}
