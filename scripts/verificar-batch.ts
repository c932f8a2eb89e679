/**
 * Verificacao rapida de um arquivo de advogados processado:
 * estados inconsistentes, oab_id ausente, nao processados e sociedades incompletas.
 *
 * Uso: npm run verificar -- <arquivo.json>
 */

import path from 'node:path';
import { carregarRegistros } from '../src/workers/batch.worker.js';
import { verificarRegistros } from '../src/utils/verificacao.js';

const LIMITE_LISTAGEM = 10;

function listar<T>(titulo: string, itens: T[], descrever: (item: T) => string) {
  if (itens.length === 0) return;

  console.log(`\n${titulo}: ${itens.length}`);
  for (const item of itens.slice(0, LIMITE_LISTAGEM)) {
    console.log(`  - ${descrever(item)}`);
  }
  if (itens.length > LIMITE_LISTAGEM) {
    console.log(`  ... e mais ${itens.length - LIMITE_LISTAGEM}`);
  }
}

async function main() {
  const arquivo = process.argv[2];
  if (!arquivo) {
    console.error('Uso: verificar-batch <arquivo.json>');
    process.exit(1);
  }

  console.log(`VERIFICANDO ARQUIVO: ${path.basename(arquivo)}`);
  console.log('='.repeat(80));

  const relatorio = verificarRegistros(await carregarRegistros(arquivo));

  console.log(`Total de registros: ${relatorio.total}`);

  if (relatorio.totalProblemas === 0) {
    console.log('\nNenhum problema encontrado!');
    return;
  }

  listar('Estados inconsistentes', relatorio.estadosInconsistentes, (p) =>
    `${p.id} ${p.nome}: state '${p.estadoAtual ?? ''}' (${p.estadoAtualLimpo ?? 'INVALIDO'}) != ${p.estadoCorreto} (oab_id ${p.oabId})`
  );
  listar('Sem oab_id', relatorio.semOabId, (p) => `${p.id} ${p.nome} (state: ${p.estado ?? 'N/A'})`);
  listar('Nao processados', relatorio.naoProcessados, (p) => `${p.id} ${p.nome} (${p.oabId ?? 'sem oab_id'})`);
  listar('Sociedades incompletas', relatorio.sociedadesIncompletas, (p) =>
    `${p.id} ${p.nome}: basicas=${p.basicas}, completas=${p.completas}`
  );

  console.log(`\nTotal de problemas: ${relatorio.totalProblemas}`);
  process.exitCode = 2;
}

main().catch((e) => {
  console.error('Erro:', e);
  process.exit(1);
});
