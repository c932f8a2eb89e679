#!/usr/bin/env node
import { access } from 'node:fs/promises';
import { carregarConfig, type Config } from './config/env.js';
import { Armazenamento, S3BlobStore } from './services/armazenamento.service.js';
import { AdvogadoService } from './services/advogado.service.js';
import { RenderService } from './services/render.service.js';
import { SessionManager } from './services/sessao.service.js';
import { SociedadeService } from './services/sociedade.service.js';
import { mensagemErro } from './utils/erros.js';
import { BatchDriver, criarEstadoExecucao } from './workers/batch.worker.js';

async function main() {
  const arquivoBatch = process.argv[2];
  if (!arquivoBatch) {
    console.error('Uso: cna-sociedades <arquivo_batch.json>');
    process.exit(1);
  }

  try {
    await access(arquivoBatch);
  } catch {
    console.error(`Arquivo nao encontrado: ${arquivoBatch}`);
    process.exit(1);
  }

  let config: Config;
  try {
    config = carregarConfig();
  } catch (error) {
    console.error(`[Config] ${mensagemErro(error)}`);
    process.exit(1);
  }

  const blobStore = new S3BlobStore(config.aws);
  try {
    await blobStore.verificarBucket();
    console.log(`[Armazenamento] Conexao com o bucket ${config.aws.bucket} verificada`);
  } catch (error) {
    console.error(`[Armazenamento] Erro ao acessar o bucket ${config.aws.bucket}: ${mensagemErro(error)}`);
    process.exit(1);
  }

  const estado = criarEstadoExecucao(arquivoBatch);
  const registrarErro = (mensagem: string): void => {
    estado.erros.push(mensagem);
  };

  const armazenamento = new Armazenamento({ store: blobStore });
  const sessionManager = new SessionManager({
    proxy: config.proxy,
    maxRequisicoes: config.maxRequisicoesSessao,
    userAgent: config.userAgent,
    ipCheckUrl: config.ipCheckUrl,
    aoNovoIp: (ip, requisicoes) => armazenamento.registrarIpProxy(ip, requisicoes),
    aoFalhar: registrarErro,
  });
  const render = new RenderService({ proxy: config.proxy, cnaUrl: config.cnaUrl, userAgent: config.userAgent });
  const sociedades = new SociedadeService({ render, armazenamento, cnaUrl: config.cnaUrl, registrarErro });
  const advogados = new AdvogadoService({ sessao: sessionManager, sociedades, cnaUrl: config.cnaUrl, registrarErro });
  const driver = new BatchDriver({
    autenticador: render,
    enriquecedor: advogados,
    armazenamento,
    modoEstado: config.modoEstado,
    tamanhoLote: config.tamanhoLote,
  });

  console.log(`
  ╔═══════════════════════════════════════════════╗
  ║        Reprocessador OAB/CNA - Iniciado       ║
  ╚═══════════════════════════════════════════════╝
  Arquivo: ${arquivoBatch}
  Modo de estado: ${config.modoEstado}
  Checkpoint a cada: ${config.tamanhoLote} advogados
  `);

  await sessionManager.obterSessao();
  if (sessionManager.ultimoIp === 'desconhecido') {
    console.warn('[Sessao] Nao foi possivel verificar o proxy, continuando mesmo assim');
  }

  const removerInterrupcao = driver.registrarInterrupcao(estado);

  try {
    await driver.executar(estado);
  } catch (error) {
    console.error(`[Batch] Erro fatal: ${mensagemErro(error)}`);
    estado.erros.push(`Erro fatal: ${mensagemErro(error)}`);
    await driver.salvarEmergencia(estado);
    process.exitCode = 1;
  } finally {
    removerInterrupcao();
    await render.finalizar();
    sessionManager.encerrar();
  }
}

main().catch((e) => {
  console.error('Erro:', e);
  process.exit(1);
});
