import { readFile } from 'node:fs/promises';
import path from 'node:path';
import type { ResultadoEnriquecimento, OpcoesEnriquecimento } from '../services/advogado.service.js';
import type { TagLogErros } from '../services/armazenamento.service.js';
import type { CookiesEToken } from '../services/render.service.js';
import { arquivoBatchSchema, type RegistroAdvogado } from '../types.js';
import { DESCRICAO_MOTIVO, separarRegistros, type ModoEstado } from '../utils/elegibilidade.js';
import { mensagemErro } from '../utils/erros.js';
import { estadoDoOabId, limparEstadoTolerante } from '../utils/estado.js';
import { sleep } from '../utils/pool.js';

/**
 * Estado de uma execucao. `advogados` e `erros` so recebem push:
 * o salvamento de emergencia le um snapshot sem concorrer com o loop.
 */
export interface EstadoExecucao {
  arquivoBatch: string;
  advogados: RegistroAdvogado[];
  erros: string[];
  lotesSalvos: number;
}

export function criarEstadoExecucao(arquivoBatch: string): EstadoExecucao {
  return { arquivoBatch, advogados: [], erros: [], lotesSalvos: 0 };
}

export interface Autenticador {
  obterCookiesEToken(): Promise<CookiesEToken>;
}

export interface Enriquecedor {
  enriquecer(
    registro: RegistroAdvogado,
    estado: string,
    numeroOab: string,
    cookies: Record<string, string>,
    token: string,
    opcoes?: OpcoesEnriquecimento
  ): Promise<ResultadoEnriquecimento>;
}

export interface PersistenciaBatch {
  salvarAdvogados(
    lista: readonly RegistroAdvogado[],
    arquivoBatch: string,
    opcoes?: { parte?: number; emergencia?: boolean }
  ): Promise<string | null>;
  salvarLogErros(erros: readonly string[], arquivoBatch: string, tag: TagLogErros): Promise<string | null>;
}

export interface EmissorSinais {
  on(evento: 'SIGINT', listener: () => void): unknown;
  off(evento: 'SIGINT', listener: () => void): unknown;
}

export interface OpcoesBatchDriver {
  autenticador: Autenticador;
  enriquecedor: Enriquecedor;
  armazenamento: PersistenciaBatch;
  modoEstado: ModoEstado;
  tamanhoLote?: number;
  pausaMs?: number;
  sair?: (codigo: number) => void;
  sinais?: EmissorSinais;
}

export interface ResumoExecucao {
  total: number;
  processados: number;
  pulados: number;
  inconsistentes: number;
  comSociedades: number;
  nomesCorrigidos: number;
  erros: number;
  lotesSalvos: number;
  arquivoFinal: string | null;
  arquivoErros: string | null;
}

/**
 * Le e valida o arquivo de batch (array de registros de advogados)
 */
export async function carregarRegistros(arquivo: string): Promise<RegistroAdvogado[]> {
  const conteudo = await readFile(arquivo, 'utf-8');
  return arquivoBatchSchema.parse(JSON.parse(conteudo));
}

function numeroDoRegistro(registro: RegistroAdvogado): string | null {
  const numero = registro.oab_number ?? registro.insc;
  if (numero === null || numero === undefined) return null;
  const texto = String(numero).trim();
  return texto || null;
}

export class BatchDriver {
  private readonly autenticador: Autenticador;
  private readonly enriquecedor: Enriquecedor;
  private readonly armazenamento: PersistenciaBatch;
  private readonly modoEstado: ModoEstado;
  private readonly tamanhoLote: number;
  private readonly pausaMs: number;
  private readonly sair: (codigo: number) => void;
  private readonly sinais: EmissorSinais;
  private interrompendo = false;

  constructor(opcoes: OpcoesBatchDriver) {
    this.autenticador = opcoes.autenticador;
    this.enriquecedor = opcoes.enriquecedor;
    this.armazenamento = opcoes.armazenamento;
    this.modoEstado = opcoes.modoEstado;
    this.tamanhoLote = opcoes.tamanhoLote ?? 400;
    this.pausaMs = opcoes.pausaMs ?? 1200;
    this.sair = opcoes.sair ?? ((codigo) => process.exit(codigo));
    this.sinais = opcoes.sinais ?? process;
  }

  /**
   * UF usada na busca: do oab_id ou do campo state, conforme o modo
   */
  resolverEstado(registro: RegistroAdvogado): string | null {
    return this.modoEstado === 'oab_id' ? estadoDoOabId(registro.oab_id) : limparEstadoTolerante(registro.state);
  }

  async executar(estado: EstadoExecucao): Promise<ResumoExecucao> {
    const registros = await carregarRegistros(estado.arquivoBatch);
    const { paraProcessar, pulados, inconsistentes } = separarRegistros(registros, this.modoEstado);

    for (const registro of pulados) {
      estado.advogados.push(registro);
    }

    console.log('[Batch] ANALISE DE REGISTROS:');
    console.log(`[Batch]   - Total de registros: ${registros.length}`);
    console.log(`[Batch]   - Para processar: ${paraProcessar.length}`);
    console.log(`[Batch]   - Ja completos (pulados): ${pulados.length}`);
    console.log(`[Batch]   - Registros com estado inconsistente (limpos): ${inconsistentes}`);
    console.log(`[Batch]   - Modo de estado: ${this.modoEstado}`);
    console.log(`[Batch] Salvamento automatico a cada ${this.tamanhoLote} advogados`);

    const resumoBase = { total: registros.length, processados: paraProcessar.length, pulados: pulados.length, inconsistentes };

    if (paraProcessar.length === 0) {
      console.log('[Batch] Todos os registros ja estao completos. Nada para processar.');
      const arquivoFinal = await this.armazenamento.salvarAdvogados([...estado.advogados], estado.arquivoBatch);
      return this.resumir(estado, resumoBase, arquivoFinal, null);
    }

    console.log('[Batch] Obtendo cookies e token iniciais...');
    let credenciais = await this.autenticador.obterCookiesEToken();

    for (const [indice, { registro, motivo }] of paraProcessar.entries()) {
      if (this.interrompendo) break;

      const nome = registro.full_name ?? 'Desconhecido';
      const uf = this.resolverEstado(registro);
      const numero = numeroDoRegistro(registro);

      try {
        if (!uf || !numero) {
          estado.erros.push(`Dados faltando - ID: ${registro.id ?? 'N/A'}, Nome: ${nome}, oab_id: ${registro.oab_id ?? 'N/A'}`);
          await this.acrescentar(estado, registro);
          continue;
        }

        console.log(`\n[Batch] [${indice + 1}/${paraProcessar.length}] ${nome} (${uf} ${numero})`);
        console.log(`[Batch]   Motivo: ${DESCRICAO_MOTIVO[motivo]}`);

        let resultado = await this.enriquecedor.enriquecer(registro, uf, numero, credenciais.cookies, credenciais.token);
        if (this.interrompendo) break;

        if (!resultado.sessaoValida) {
          console.log('[Batch]   Renovando cookies...');
          credenciais = await this.autenticador.obterCookiesEToken();
          resultado = await this.enriquecedor.enriquecer(registro, uf, numero, credenciais.cookies, credenciais.token, {
            tentativas: 2,
          });
          if (this.interrompendo) break;
        }

        const enriquecido = resultado.registro;
        const partes = enriquecido.has_society
          ? [`${enriquecido.society_complete_details?.length ?? 0} sociedades`]
          : ['sem sociedades'];
        if (enriquecido.corrected_full_name) partes.push('nome corrigido');
        if (enriquecido.state !== registro.state) partes.push(`estado atualizado para ${uf}`);
        console.log(`[Batch]   Concluido: ${partes.join(', ')}`);

        await this.acrescentar(estado, enriquecido);
        await sleep(this.pausaMs);
      } catch (error) {
        const mensagem = `Erro processando ${uf ?? 'N/A'} ${numero ?? 'N/A'} - ${nome}: ${mensagemErro(error)}`;
        console.error(`[Batch] ERRO GERAL: ${mensagem}`);
        estado.erros.push(mensagem);
        await this.acrescentar(estado, registro);
      }
    }

    // o handler de SIGINT ja esta gravando o snapshot EMERGENCY
    if (this.interrompendo) {
      console.log(`[Batch] Processamento interrompido apos ${estado.advogados.length} advogados`);
      return this.resumir(estado, resumoBase, null, null);
    }

    console.log('[Batch] Salvando resultados finais...');
    const arquivoFinal = await this.armazenamento.salvarAdvogados([...estado.advogados], estado.arquivoBatch);
    const arquivoErros = await this.armazenamento.salvarLogErros([...estado.erros], estado.arquivoBatch, 'FINAL');

    return this.resumir(estado, resumoBase, arquivoFinal, arquivoErros);
  }

  /**
   * Salva snapshot EMERGENCY e o log de erros de emergencia
   */
  async salvarEmergencia(estado: EstadoExecucao): Promise<void> {
    const advogados = [...estado.advogados];
    const erros = [...estado.erros];

    if (advogados.length > 0) {
      const arquivo = await this.armazenamento.salvarAdvogados(advogados, estado.arquivoBatch, { emergencia: true });
      console.log(`[Batch] Dados salvos em: ${arquivo ?? 'falha no salvamento'}`);
    }
    await this.armazenamento.salvarLogErros(erros, estado.arquivoBatch, 'emergency');
  }

  /**
   * Ctrl+C: salva o que foi acumulado e encerra o processo.
   * Retorna a funcao que remove o handler.
   */
  registrarInterrupcao(estado: EstadoExecucao): () => void {
    const handler = (): void => {
      if (this.interrompendo) return;
      this.interrompendo = true;

      console.log(`\n[Batch] Interrupcao detectada! Salvando ${estado.advogados.length} advogados processados...`);
      this.salvarEmergencia(estado)
        .then(() => this.sair(0))
        .catch((error: unknown) => {
          console.error(`[Batch] Falha no salvamento de emergencia: ${mensagemErro(error)}`);
          this.sair(1);
        });
    };

    this.sinais.on('SIGINT', handler);
    return () => {
      this.sinais.off('SIGINT', handler);
    };
  }

  private async acrescentar(estado: EstadoExecucao, registro: RegistroAdvogado): Promise<void> {
    estado.advogados.push(registro);

    if (estado.advogados.length % this.tamanhoLote === 0) {
      estado.lotesSalvos++;
      console.log(`\n[Batch] SALVAMENTO AUTOMATICO - LOTE ${estado.lotesSalvos}`);
      await this.armazenamento.salvarAdvogados([...estado.advogados], estado.arquivoBatch, { parte: estado.lotesSalvos });
    }
  }

  private resumir(
    estado: EstadoExecucao,
    base: Pick<ResumoExecucao, 'total' | 'processados' | 'pulados' | 'inconsistentes'>,
    arquivoFinal: string | null,
    arquivoErros: string | null
  ): ResumoExecucao {
    const resumo: ResumoExecucao = {
      ...base,
      comSociedades: estado.advogados.filter((a) => a.has_society === true).length,
      nomesCorrigidos: estado.advogados.filter((a) => Boolean(a.corrected_full_name)).length,
      erros: estado.erros.length,
      lotesSalvos: estado.lotesSalvos,
      arquivoFinal,
      arquivoErros,
    };

    console.log('\n[Batch] PROCESSAMENTO CONCLUIDO');
    console.log(`[Batch]   - Arquivo processado: ${path.basename(estado.arquivoBatch)}`);
    console.log(`[Batch]   - Total de registros: ${resumo.total}`);
    console.log(`[Batch]   - Registros processados: ${resumo.processados}`);
    console.log(`[Batch]   - Registros ja completos (pulados): ${resumo.pulados}`);
    console.log(`[Batch]   - Registros com estado inconsistente: ${resumo.inconsistentes}`);
    console.log(`[Batch]   - Com sociedades: ${resumo.comSociedades}`);
    console.log(`[Batch]   - Nomes corrigidos: ${resumo.nomesCorrigidos}`);
    console.log(`[Batch]   - Erros encontrados: ${resumo.erros}`);
    console.log(`[Batch]   - Lotes salvos: ${resumo.lotesSalvos}`);
    console.log(`[Batch]   - Arquivo final: ${arquivoFinal ?? 'Nenhum dado para salvar'}`);
    if (arquivoErros) {
      console.log(`[Batch]   - Log de erros: ${arquivoErros}`);
    }

    return resumo;
  }
}
