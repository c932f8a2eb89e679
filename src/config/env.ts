import 'dotenv/config';
import { ConfiguracaoError } from '../utils/erros.js';
import type { ModoEstado } from '../utils/elegibilidade.js';

export interface ProxyConfig {
  host: string;
  porta: number;
  usuario?: string | null;
  senha?: string | null;
  protocolo: string;
}

export interface AwsConfig {
  accessKeyId: string;
  secretAccessKey: string;
  bucket: string;
  regiao: string;
}

export interface Config {
  proxy: ProxyConfig;
  aws: AwsConfig;
  cnaUrl: string;
  modoEstado: ModoEstado;
  tamanhoLote: number;
  maxRequisicoesSessao: number;
  ipCheckUrl: string;
  userAgent: string;
}

const OBRIGATORIAS = [
  'PROXY_USERNAME',
  'PROXY_PASSWORD',
  'PROXY_HOST',
  'AWS_ACCESS_KEY_ID',
  'AWS_SECRET_ACCESS_KEY',
  'AWS_BUCKET',
  'AWS_DEFAULT_REGION',
] as const;

export const USER_AGENT_PADRAO =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/119.0.0.0 Safari/537.36';

function lerInteiro(valor: string | undefined, padrao: number, nome: string): number {
  if (valor === undefined || valor === '') return padrao;
  const numero = parseInt(valor, 10);
  if (Number.isNaN(numero) || numero <= 0) {
    throw new ConfiguracaoError(`${nome} deve ser um inteiro positivo (recebido: '${valor}')`);
  }
  return numero;
}

// PROXY_HOST vem como "host:porta"
export function parseProxyHost(valor: string): { host: string; porta: number } {
  const [host, porta] = valor.split(':');
  const numeroPorta = parseInt(porta ?? '', 10);
  if (!host || Number.isNaN(numeroPorta)) {
    throw new ConfiguracaoError(`PROXY_HOST invalido: '${valor}' (formato esperado: host:porta)`);
  }
  return { host, porta: numeroPorta };
}

/**
 * Le e valida a configuracao a partir das variaveis de ambiente
 */
export function carregarConfig(fonte: NodeJS.ProcessEnv = process.env): Config {
  const faltando = OBRIGATORIAS.filter((nome) => !fonte[nome]);
  if (faltando.length > 0) {
    throw new ConfiguracaoError(`Variaveis de ambiente faltando: ${faltando.join(', ')}`);
  }

  const modo = fonte.MODO_ESTADO || 'oab_id';
  if (modo !== 'oab_id' && modo !== 'heuristico') {
    throw new ConfiguracaoError(`MODO_ESTADO invalido: '${modo}' (use oab_id ou heuristico)`);
  }

  const { host, porta } = parseProxyHost(fonte.PROXY_HOST || '');

  return {
    proxy: {
      host,
      porta,
      usuario: fonte.PROXY_USERNAME,
      senha: fonte.PROXY_PASSWORD,
      protocolo: 'http',
    },
    aws: {
      accessKeyId: fonte.AWS_ACCESS_KEY_ID || '',
      secretAccessKey: fonte.AWS_SECRET_ACCESS_KEY || '',
      bucket: fonte.AWS_BUCKET || '',
      regiao: fonte.AWS_DEFAULT_REGION || '',
    },
    cnaUrl: (fonte.CNA_URL || 'https://cna.oab.org.br').replace(/\/+$/, ''),
    modoEstado: modo,
    tamanhoLote: lerInteiro(fonte.TAMANHO_LOTE, 400, 'TAMANHO_LOTE'),
    maxRequisicoesSessao: lerInteiro(fonte.MAX_REQUISICOES_SESSAO, 100, 'MAX_REQUISICOES_SESSAO'),
    ipCheckUrl: fonte.IP_CHECK_URL || 'https://ip.decodo.com/json',
    userAgent: fonte.USER_AGENT || USER_AGENT_PADRAO,
  };
}
