import { appendFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { HeadBucketCommand, PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import { format } from 'date-fns';
import type { AwsConfig } from '../config/env.js';
import type { RegistroAdvogado } from '../types.js';
import { mensagemErro } from '../utils/erros.js';

const PREFIXO_DADOS = 'oab_data';

export interface BlobStore {
  put(conteudo: string, chave: string, contentType: string): Promise<string | null>;
}

export class S3BlobStore implements BlobStore {
  private readonly client: S3Client;

  constructor(private readonly aws: AwsConfig) {
    this.client = new S3Client({
      region: aws.regiao,
      credentials: {
        accessKeyId: aws.accessKeyId,
        secretAccessKey: aws.secretAccessKey,
      },
    });
  }

  async put(conteudo: string, chave: string, contentType: string): Promise<string | null> {
    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: this.aws.bucket,
          Key: chave,
          Body: Buffer.from(conteudo, 'utf-8'),
          ContentType: contentType,
          ServerSideEncryption: 'AES256',
        })
      );
      return `s3://${this.aws.bucket}/${chave}`;
    } catch (error) {
      console.error(`[Armazenamento] Erro ao fazer upload para S3: ${mensagemErro(error)}`);
      return null;
    }
  }

  /**
   * Lanca se o bucket nao existe ou as credenciais nao dao acesso
   */
  async verificarBucket(): Promise<void> {
    await this.client.send(new HeadBucketCommand({ Bucket: this.aws.bucket }));
    console.log(`[Armazenamento] Conectado ao bucket S3: ${this.aws.bucket}`);
  }
}

export type TagLogErros = 'FINAL' | 'emergency';

export interface OpcoesArmazenamento {
  store: BlobStore | null;
  diretorio?: string;
  relogio?: () => Date;
}

function serializar(dados: unknown): string {
  if (typeof dados === 'object' && dados !== null) {
    return JSON.stringify(dados, null, 2);
  }
  return String(dados);
}

export function nomeBaseBatch(arquivoBatch: string): string {
  return path.parse(arquivoBatch).name;
}

export class Armazenamento {
  private readonly store: BlobStore | null;
  private readonly diretorio: string;
  private readonly relogio: () => Date;

  constructor(opcoes: OpcoesArmazenamento) {
    this.store = opcoes.store;
    this.diretorio = opcoes.diretorio ?? process.cwd();
    this.relogio = opcoes.relogio ?? (() => new Date());
  }

  timestamp(): string {
    return format(this.relogio(), 'yyyyMMdd_HHmmss');
  }

  /**
   * Envia ao blob store e sempre tenta manter uma copia local.
   * Sem blob store, salva so localmente; se ate isso falhar, grava com prefixo emergency_.
   */
  async salvarComBackup(dados: unknown, nomeArquivo: string, contentType = 'application/json'): Promise<string | null> {
    const conteudo = serializar(dados);
    const caminhoLocal = path.join(this.diretorio, nomeArquivo);

    try {
      const locator = this.store ? await this.store.put(conteudo, `${PREFIXO_DADOS}/${nomeArquivo}`, contentType) : null;

      if (locator) {
        console.log(`[Armazenamento] Salvo no S3: ${locator}`);
        try {
          await writeFile(caminhoLocal, conteudo, 'utf-8');
          console.log(`[Armazenamento] Backup local: ${nomeArquivo}`);
        } catch (error) {
          console.warn(`[Armazenamento] Backup local falhou: ${mensagemErro(error)}`);
        }
        return locator;
      }

      console.warn('[Armazenamento] S3 falhou, salvando apenas localmente');
      await writeFile(caminhoLocal, conteudo, 'utf-8');
      return nomeArquivo;
    } catch (error) {
      console.error(`[Armazenamento] Erro no salvamento de ${nomeArquivo}: ${mensagemErro(error)}`);

      const nomeEmergencia = `emergency_${nomeArquivo}`;
      try {
        await writeFile(path.join(this.diretorio, nomeEmergencia), conteudo, 'utf-8');
        return nomeEmergencia;
      } catch (erroEmergencia) {
        console.error(`[Armazenamento] Salvamento de emergencia falhou: ${mensagemErro(erroEmergencia)}`);
        return null;
      }
    }
  }

  async salvarAdvogados(
    lista: readonly RegistroAdvogado[],
    arquivoBatch: string,
    opcoes: { parte?: number; emergencia?: boolean } = {}
  ): Promise<string | null> {
    if (lista.length === 0) {
      console.log('[Armazenamento] Nenhum advogado para salvar');
      return null;
    }

    const base = nomeBaseBatch(arquivoBatch);
    const ts = this.timestamp();

    let nomeArquivo: string;
    if (opcoes.emergencia) {
      nomeArquivo = `lawyers_enhanced_${base}_EMERGENCY_${ts}.json`;
    } else if (opcoes.parte !== undefined) {
      nomeArquivo = `lawyers_enhanced_${base}_part_${String(opcoes.parte).padStart(3, '0')}_${ts}.json`;
    } else {
      nomeArquivo = `lawyers_enhanced_${base}_FINAL_${ts}.json`;
    }

    const resultado = await this.salvarComBackup(lista, nomeArquivo);
    if (resultado) {
      console.log(`[Armazenamento] Salvos ${lista.length} registros de advogados em ${nomeArquivo}`);
    }
    return resultado ? nomeArquivo : null;
  }

  async salvarLogErros(erros: readonly string[], arquivoBatch: string, tag: TagLogErros): Promise<string | null> {
    if (erros.length === 0) return null;

    const nomeArquivo = `error_log_${nomeBaseBatch(arquivoBatch)}_${tag}_${this.timestamp()}.txt`;
    const titulo = tag === 'FINAL' ? 'Log de Erros Final' : 'Log de Erros de Emergência';
    const conteudo = [`${titulo} - ${arquivoBatch}`, '='.repeat(50), '', ...erros].join('\n');

    const resultado = await this.salvarComBackup(conteudo, nomeArquivo, 'text/plain');
    return resultado ? nomeArquivo : null;
  }

  /**
   * Log de IPs do proxy: uma linha JSON por sessao criada
   */
  async registrarIpProxy(ipData: Record<string, unknown>, requisicoes: number): Promise<void> {
    const agora = this.relogio();
    const linha =
      JSON.stringify({
        timestamp: format(agora, 'yyyy-MM-dd HH:mm:ss'),
        ip_data: ipData,
        session_request_count: requisicoes,
      }) + '\n';

    if (this.store) {
      await this.store.put(linha, `logs/proxy_ip_log_${format(agora, 'yyyyMMdd')}.jsonl`, 'text/plain');
    }

    try {
      await appendFile(path.join(this.diretorio, 'proxy_ip_log.json'), linha, 'utf-8');
    } catch (error) {
      console.warn(`[Armazenamento] Erro ao gravar log de IP local: ${mensagemErro(error)}`);
    }
  }
}
