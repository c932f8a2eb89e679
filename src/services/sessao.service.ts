import http from 'node:http';
import https from 'node:https';
import axios, { isAxiosError, type AxiosRequestConfig, type AxiosResponse } from 'axios';
import type { ProxyConfig } from '../config/env.js';
import { USER_AGENT_PADRAO } from '../config/env.js';
import { FalhaTransporteError, mensagemErro } from '../utils/erros.js';
import { sleep } from '../utils/pool.js';

export interface SessaoHttp {
  id: number;
  requisitar(config: AxiosRequestConfig): Promise<AxiosResponse<unknown> | null>;
  fechar(): void;
}

export interface ConfigSessao {
  proxy: ProxyConfig;
  timeoutMs: number;
  userAgent: string;
}

export type FabricaSessao = (config: ConfigSessao, id: number) => SessaoHttp;

export type DadosIp = Record<string, unknown>;

export interface OpcoesSessionManager {
  proxy: ProxyConfig;
  maxRequisicoes?: number;
  timeoutMs?: number;
  userAgent?: string;
  ipCheckUrl?: string;
  verificarIp?: boolean;
  fabrica?: FabricaSessao;
  aoNovoIp?: (ip: DadosIp, requisicoes: number) => Promise<unknown>;
  aoFalhar?: (mensagem: string) => void;
}

export interface OpcoesRequisicao {
  tentativas?: number;
  atrasoMs?: number;
  json?: unknown;
  headers?: Record<string, string>;
  cookies?: Record<string, string>;
}

export type MetodoHttp = 'GET' | 'POST';

/**
 * Sessao axios com proxy rotativo. O fechamento destroi os agents,
 * o que forca uma nova conexao (e um novo IP de saida) na proxima sessao.
 */
export function criarSessaoAxios(config: ConfigSessao, id: number): SessaoHttp {
  const httpAgent = new http.Agent({ keepAlive: true });
  const httpsAgent = new https.Agent({ keepAlive: true, rejectUnauthorized: false });

  const cliente = axios.create({
    timeout: config.timeoutMs,
    headers: { 'User-Agent': config.userAgent },
    httpAgent,
    httpsAgent,
    proxy: {
      protocol: config.proxy.protocolo,
      host: config.proxy.host,
      port: config.proxy.porta,
      auth: config.proxy.usuario
        ? { username: config.proxy.usuario, password: config.proxy.senha || '' }
        : undefined,
    },
  });

  return {
    id,
    requisitar: (requestConfig) => cliente.request<unknown>(requestConfig),
    fechar: () => {
      httpAgent.destroy();
      httpsAgent.destroy();
    },
  };
}

export function montarCookieHeader(cookies: Record<string, string>): string {
  return Object.entries(cookies)
    .map(([nome, valor]) => `${nome}=${valor}`)
    .join('; ');
}

function statusDoErro(error: unknown): number | null {
  if (isAxiosError(error)) return error.response?.status ?? null;
  if (error instanceof FalhaTransporteError) return error.statusHttp;
  return null;
}

export class SessionManager {
  private sessao: SessaoHttp | null = null;
  private usos = 0;
  // requisicoes feitas pela sessao anterior, gravadas no log de IP
  private usosSessaoAnterior = 0;
  private totalSessoes = 0;
  private ipAtual: string | null = null;

  private readonly config: ConfigSessao;
  private readonly maxRequisicoes: number;
  private readonly ipCheckUrl: string;
  private readonly verificarIp: boolean;
  private readonly fabrica: FabricaSessao;
  private readonly aoNovoIp?: (ip: DadosIp, requisicoes: number) => Promise<unknown>;
  private readonly aoFalhar?: (mensagem: string) => void;

  constructor(opcoes: OpcoesSessionManager) {
    this.config = {
      proxy: opcoes.proxy,
      timeoutMs: opcoes.timeoutMs ?? 30000,
      userAgent: opcoes.userAgent ?? USER_AGENT_PADRAO,
    };
    this.maxRequisicoes = opcoes.maxRequisicoes ?? 100;
    this.ipCheckUrl = opcoes.ipCheckUrl ?? 'https://ip.decodo.com/json';
    this.verificarIp = opcoes.verificarIp ?? true;
    this.fabrica = opcoes.fabrica ?? criarSessaoAxios;
    this.aoNovoIp = opcoes.aoNovoIp;
    this.aoFalhar = opcoes.aoFalhar;
  }

  get usosSessaoAtual(): number {
    return this.usos;
  }

  get ultimoIp(): string | null {
    return this.ipAtual;
  }

  /**
   * Retorna a sessao atual, recriando-a quando nao existe ou o limite de usos foi atingido
   */
  async obterSessao(): Promise<SessaoHttp> {
    if (!this.sessao || this.usos >= this.maxRequisicoes) {
      if (this.sessao) {
        console.log(`[Sessao] Fechando sessao anterior apos ${this.usos} requisicoes`);
        this.fecharSessao();
      }

      console.log('[Sessao] Criando nova sessao com proxy...');
      this.totalSessoes++;
      this.sessao = this.fabrica(this.config, this.totalSessoes);
      this.usos = 0;

      if (this.verificarIp) {
        await this.registrarIp(this.sessao);
      }
    }

    this.usos++;
    return this.sessao;
  }

  /**
   * Descarta a sessao atual; a proxima chamada cria outra
   */
  invalidar(): void {
    this.fecharSessao();
    this.usos = 0;
  }

  encerrar(): void {
    this.invalidar();
  }

  /**
   * Consulta o IP de saida da sessao (apenas para log)
   */
  async consultarIp(sessao: SessaoHttp): Promise<DadosIp | null> {
    try {
      const resposta = await sessao.requisitar({ method: 'GET', url: this.ipCheckUrl, timeout: 10000 });
      const dados = resposta?.data;
      if (resposta && resposta.status === 200 && typeof dados === 'object' && dados !== null && !Array.isArray(dados)) {
        return Object.fromEntries(Object.entries(dados));
      }
    } catch (error) {
      console.warn(`[Sessao] Erro ao obter IP atual: ${mensagemErro(error)}`);
    }
    return null;
  }

  /**
   * Requisicao com retry: falha de transporte descarta a sessao e aguarda um atraso fixo
   */
  async requisitar(metodo: MetodoHttp, url: string, opcoes: OpcoesRequisicao = {}): Promise<AxiosResponse<unknown>> {
    const tentativas = opcoes.tentativas ?? 4;
    const atrasoMs = opcoes.atrasoMs ?? 2000;

    const headers: Record<string, string> = { ...opcoes.headers };
    if (opcoes.cookies && Object.keys(opcoes.cookies).length > 0) {
      headers.Cookie = montarCookieHeader(opcoes.cookies);
    }

    let ultimoErro = 'Erro desconhecido';
    let ultimoStatus: number | null = null;

    for (let tentativa = 1; tentativa <= tentativas; tentativa++) {
      try {
        const sessao = await this.obterSessao();

        if (this.usos % 10 === 1) {
          console.log(`[Sessao] Requisicao #${this.usos}/${this.maxRequisicoes} - IP: ${this.ipAtual ?? 'desconhecido'}`);
        }

        const resposta = await sessao.requisitar({
          method: metodo,
          url,
          headers,
          data: opcoes.json,
        });

        if (!resposta) {
          throw new FalhaTransporteError('Resposta vazia recebida');
        }

        if (resposta.status < 200 || resposta.status >= 300) {
          throw new FalhaTransporteError(`HTTP ${resposta.status} em ${url}`, resposta.status);
        }

        return resposta;
      } catch (error) {
        ultimoErro = mensagemErro(error);
        ultimoStatus = statusDoErro(error);

        console.error(`[Sessao] Tentativa ${tentativa}/${tentativas} falhou (${metodo} ${url}): ${ultimoErro}`);
        this.aoFalhar?.(`${metodo} ${url}: ${ultimoErro}`);
        this.invalidar();

        if (tentativa < tentativas) {
          console.log(`[Sessao] Aguardando ${atrasoMs / 1000}s antes da proxima tentativa...`);
          await sleep(atrasoMs);
        }
      }
    }

    throw new FalhaTransporteError(`Requisicao falhou apos ${tentativas} tentativas: ${ultimoErro}`, ultimoStatus);
  }

  private fecharSessao(): void {
    if (!this.sessao) return;

    try {
      this.sessao.fechar();
    } catch (error) {
      console.warn(`[Sessao] Erro ao fechar sessao anterior: ${mensagemErro(error)}`);
    }
    this.usosSessaoAnterior = this.usos;
    this.sessao = null;
  }

  private async registrarIp(sessao: SessaoHttp): Promise<void> {
    const dados = await this.consultarIp(sessao);

    if (!dados) {
      this.ipAtual = 'desconhecido';
      console.warn('[Sessao] Nova sessao criada, mas nao foi possivel verificar o IP do proxy');
      return;
    }

    this.ipAtual = typeof dados.ip === 'string' ? dados.ip : 'desconhecido';
    const cidade = typeof dados.city === 'string' ? dados.city : 'desconhecida';
    const pais = typeof dados.country === 'string' ? dados.country : 'desconhecido';
    console.log(`[Sessao] Nova sessao criada. IP do proxy: ${this.ipAtual} (${cidade}, ${pais})`);

    if (this.aoNovoIp) {
      try {
        await this.aoNovoIp(dados, this.usosSessaoAnterior);
      } catch (error) {
        console.warn(`[Sessao] Erro ao salvar log de IP: ${mensagemErro(error)}`);
      }
    }
  }
}
