import {
  respostaBuscaSchema,
  respostaDetalheSchema,
  type RegistroAdvogado,
  type SociedadeBasica,
  type SociedadeCompleta,
} from '../types.js';
import { FalhaTransporteError, mensagemErro } from '../utils/erros.js';
import { executarComLimite, sleep } from '../utils/pool.js';
import type { MetodoHttp, OpcoesRequisicao } from './sessao.service.js';

const HEADERS_CNA = {
  'User-Agent': 'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:89.0) Gecko/20100101 Firefox/89.0',
  'Content-Type': 'application/json',
  Accept: 'application/json, text/javascript, */*; q=0.01',
};

const STATUS_SESSAO_EXPIRADA = [401, 403, 419];

export interface ClienteHttp {
  requisitar(metodo: MetodoHttp, url: string, opcoes?: OpcoesRequisicao): Promise<{ data: unknown }>;
}

export interface BuscadorSociedade {
  buscarDetalhe(
    sociedade: SociedadeBasica,
    estado: string,
    numeroOab: string,
    nomeAdvogado: string
  ): Promise<SociedadeCompleta | null>;
}

export interface OpcoesAdvogadoService {
  sessao: ClienteHttp;
  sociedades: BuscadorSociedade;
  cnaUrl?: string;
  workers?: number;
  registrarErro?: (mensagem: string) => void;
}

export interface OpcoesEnriquecimento {
  tentativas?: number;
  atrasoMs?: number;
}

export interface ResultadoEnriquecimento {
  registro: RegistroAdvogado;
  sessaoValida: boolean;
}

/**
 * 401/403/419 ou mensagem mencionando token: cookies/token precisam ser renovados
 */
export function erroDeAutenticacao(error: unknown): boolean {
  if (!(error instanceof FalhaTransporteError)) return false;
  if (error.statusHttp !== null && STATUS_SESSAO_EXPIRADA.includes(error.statusHttp)) return true;
  return error.message.toLowerCase().includes('token');
}

export class AdvogadoService {
  private readonly sessao: ClienteHttp;
  private readonly sociedades: BuscadorSociedade;
  private readonly cnaUrl: string;
  private readonly workers: number;
  private readonly registrarErro: (mensagem: string) => void;

  constructor(opcoes: OpcoesAdvogadoService) {
    this.sessao = opcoes.sessao;
    this.sociedades = opcoes.sociedades;
    this.cnaUrl = opcoes.cnaUrl ?? 'https://cna.oab.org.br';
    this.workers = opcoes.workers ?? 2;
    this.registrarErro = opcoes.registrarErro ?? (() => undefined);
  }

  /**
   * Busca o advogado no CNA e enriquece o registro com nome corrigido e sociedades.
   * Nunca lanca: erros viram entradas no log e o registro parcial e devolvido.
   */
  async enriquecer(
    registro: RegistroAdvogado,
    estado: string,
    numeroOab: string,
    cookies: Record<string, string>,
    token: string,
    opcoes: OpcoesEnriquecimento = {}
  ): Promise<ResultadoEnriquecimento> {
    const tentativas = opcoes.tentativas ?? 4;
    const atrasoMs = opcoes.atrasoMs ?? 2000;

    const enriquecido: RegistroAdvogado = {
      ...registro,
      processed: true,
      has_society: false,
      corrected_full_name: null,
      society_link: null,
      society_basic_details: [],
      society_complete_details: [],
      state: estado,
    };

    const corpoBusca = {
      __RequestVerificationToken: token,
      IsMobile: 'false',
      NomeAdvo: '',
      Insc: numeroOab,
      Uf: estado,
      TipoInsc: '',
    };
    const requisicao: OpcoesRequisicao = { tentativas: 4, atrasoMs, headers: HEADERS_CNA, cookies };

    for (let tentativa = 1; tentativa <= tentativas; tentativa++) {
      try {
        console.log(`[Advogado] Tentativa ${tentativa}: buscando ${estado} ${numeroOab}...`);

        const respostaBusca = await this.sessao.requisitar('POST', `${this.cnaUrl}/Home/Search`, {
          ...requisicao,
          json: corpoBusca,
        });
        const busca = respostaBuscaSchema.parse(respostaBusca.data);
        const primeiro = busca.Data?.[0];

        if (!busca.Success || !primeiro) {
          const mensagem = `Busca falhou ou sem resultados para ${estado} ${numeroOab}`;
          console.warn(`[Advogado] ${mensagem}`);
          if (tentativa < tentativas) {
            await sleep(atrasoMs);
            continue;
          }
          this.registrarErro(mensagem);
          return { registro: enriquecido, sessaoValida: true };
        }

        this.compararNome(enriquecido, primeiro.Nome);

        const urlDetalhe = this.cnaUrl + primeiro.DetailUrl;
        enriquecido.society_link = urlDetalhe;

        const respostaDetalhe = await this.sessao.requisitar('GET', urlDetalhe, requisicao);
        const detalhe = respostaDetalheSchema.parse(respostaDetalhe.data);
        const sociedades = detalhe.Success ? detalhe.Data?.Sociedades : null;

        if (!sociedades || sociedades.length === 0) {
          console.log(`[Advogado] ${enriquecido.full_name ?? numeroOab} nao possui sociedades`);
          return { registro: enriquecido, sessaoValida: true };
        }

        enriquecido.has_society = true;
        enriquecido.society_basic_details = sociedades.map((s) => ({
          Insc: s.Insc,
          NomeSoci: s.NomeSoci,
          IdtSoci: s.IdtSoci,
          SiglUf: s.SiglUf,
          Url: s.Url,
        }));

        console.log(`[Advogado] Encontradas ${sociedades.length} sociedades, processando detalhes...`);
        enriquecido.society_complete_details = await this.buscarSociedades(
          sociedades,
          estado,
          numeroOab,
          enriquecido.corrected_full_name || enriquecido.full_name || ''
        );

        console.log(`[Advogado] Processamento completo: ${enriquecido.society_complete_details.length} sociedades`);
        return { registro: enriquecido, sessaoValida: true };
      } catch (error) {
        const mensagem = mensagemErro(error);

        if (erroDeAutenticacao(error)) {
          console.warn(`[Advogado] Sessao expirada: ${mensagem}`);
          return { registro: enriquecido, sessaoValida: false };
        }

        console.error(`[Advogado] Tentativa ${tentativa} falhou: ${mensagem}`);
        if (tentativa < tentativas) {
          await sleep(atrasoMs);
          continue;
        }

        this.registrarErro(`Maximo de tentativas excedido para ${estado} ${numeroOab}: ${mensagem}`);
        return { registro: enriquecido, sessaoValida: true };
      }
    }

    return { registro: enriquecido, sessaoValida: true };
  }

  // O nome original nunca e sobrescrito; a grafia do CNA vai para corrected_full_name
  private compararNome(registro: RegistroAdvogado, nomeExterno: string | null | undefined): void {
    const externo = nomeExterno?.trim();
    if (!externo) return;

    const original = (registro.full_name ?? '').trim();
    if (original.toUpperCase() !== externo.toUpperCase()) {
      console.log(`[Advogado] Nome diferente: '${original}' -> '${externo}'`);
      registro.corrected_full_name = externo;
    }
  }

  private async buscarSociedades(
    sociedades: SociedadeBasica[],
    estado: string,
    numeroOab: string,
    nomeAdvogado: string
  ): Promise<SociedadeCompleta[]> {
    const resultados = await executarComLimite(sociedades, this.workers, (sociedade) =>
      this.sociedades.buscarDetalhe(sociedade, estado, numeroOab, nomeAdvogado)
    );

    const completas: SociedadeCompleta[] = [];
    resultados.forEach((resultado, indice) => {
      if (resultado.status === 'rejected') {
        const mensagem = `Erro processando sociedade ${indice}: ${mensagemErro(resultado.reason)}`;
        console.error(`[Advogado] ${mensagem}`);
        this.registrarErro(mensagem);
      } else if (resultado.value) {
        completas.push(resultado.value);
      }
    });

    return completas;
  }
}
