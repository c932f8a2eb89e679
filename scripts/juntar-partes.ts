/**
 * Junta os arquivos FINAL de um batch dividido em partes.
 *
 * Uso:
 *   npm run juntar -- <saida.json> <arquivo1.json> [arquivo2.json ...]
 *   npm run juntar -- --prefixo <prefixo> [diretorio]
 */

import path from 'node:path';
import { format } from 'date-fns';
import { encontrarArquivosFinais, juntarArquivos } from '../src/utils/juntar.js';

async function main() {
  const args = process.argv.slice(2);

  if (args[0] === '--prefixo' && args[1]) {
    const prefixo = args[1];
    const diretorio = args[2] ?? process.cwd();
    const arquivos = await encontrarArquivosFinais(diretorio, prefixo);

    console.log(`Encontrados ${arquivos.length} arquivos:`);
    arquivos.forEach((arquivo, i) => console.log(`  ${i + 1}. ${path.basename(arquivo)}`));

    const saida = path.join(diretorio, `lawyers_${prefixo}_MERGED_${format(new Date(), 'yyyyMMdd_HHmmss')}.json`);
    const resultado = await juntarArquivos(arquivos, saida);
    console.log(`\nTotal: ${resultado.total} objetos`);
    return;
  }

  const [saida, ...arquivos] = args;
  if (!saida || arquivos.length === 0) {
    console.error('Uso: juntar-partes <saida.json> <arquivo1.json> [arquivo2.json ...]');
    console.error('     juntar-partes --prefixo <prefixo> [diretorio]');
    process.exit(1);
  }

  const resultado = await juntarArquivos(arquivos, saida);
  console.log(`\nJuncao concluida: ${resultado.total} objetos de ${resultado.lidos.length} arquivos`);
  if (resultado.ignorados.length > 0) {
    console.log(`Arquivos ignorados: ${resultado.ignorados.join(', ')}`);
  }
}

main().catch((e) => {
  console.error('Erro:', e);
  process.exit(1);
});
