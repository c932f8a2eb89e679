import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { RegistroAdvogado, SociedadeBasica, SociedadeCompleta } from '../types.js';
import { FalhaTransporteError } from '../utils/erros.js';
import { AdvogadoService, erroDeAutenticacao, type BuscadorSociedade, type ClienteHttp } from './advogado.service.js';
import type { MetodoHttp } from './sessao.service.js';

const CNA = 'https://registro.test';

const registro: RegistroAdvogado = {
  id: 10,
  full_name: 'Joao da Silva',
  oab_number: '185929',
  state: 'MG',
  oab_id: 'MG_185929',
  foto_url: 'https://example.com/f.jpg',
};

function sociedade(indice: number): SociedadeBasica {
  return { Insc: `${indice}00`, NomeSoci: `Sociedade ${indice}`, IdtSoci: indice, SiglUf: 'MG', Url: `/Home/Sociedade/${indice}` };
}

function completa(stub: SociedadeBasica): SociedadeCompleta {
  return {
    lawyer_info: { lawyer_name: 'x', lawyer_state: 'MG', lawyer_oab_number: '185929' },
    basic_info: { Insc: stub.Insc, NomeSoci: stub.NomeSoci, IdtSoci: stub.IdtSoci, SiglUf: stub.SiglUf, source_url: CNA + stub.Url },
    modal_data: {
      extraction_method: 'specific_modal_parser',
      content_loaded: true,
      timestamp: '2026-01-01T00:00:00.000Z',
      url: CNA + stub.Url,
      extraction_success: 5,
    },
    processed_at: '2026-01-01T00:00:00.000Z',
  };
}

type Roteador = (metodo: MetodoHttp, url: string) => unknown;

function criarCliente(roteador: Roteador) {
  const requisitar = vi.fn(async (metodo: MetodoHttp, url: string) => ({ data: roteador(metodo, url) }));
  const cliente: ClienteHttp = { requisitar };
  return { cliente, requisitar };
}

const buscaOk = { Success: true, Data: [{ Nome: 'JOAO DA SILVA', DetailUrl: '/Home/Detail/abc' }] };

function criarService(cliente: ClienteHttp, sociedades: BuscadorSociedade, registrarErro = vi.fn()) {
  return new AdvogadoService({ sessao: cliente, sociedades, cnaUrl: CNA, registrarErro });
}

const semSociedades: BuscadorSociedade = { buscarDetalhe: vi.fn(async () => null) };

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

describe('AdvogadoService.enriquecer', () => {
  it('envia a busca com o corpo e os headers esperados', async () => {
    const { cliente, requisitar } = criarCliente((metodo) =>
      metodo === 'POST' ? buscaOk : { Success: true, Data: { Sociedades: [] } }
    );

    await criarService(cliente, semSociedades).enriquecer(registro, 'MG', '185929', { sessao: 'c1' }, 'tok-1', { atrasoMs: 0 });

    expect(requisitar).toHaveBeenNthCalledWith(1, 'POST', `${CNA}/Home/Search`, {
      tentativas: 4,
      atrasoMs: 0,
      headers: {
        'User-Agent': 'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:89.0) Gecko/20100101 Firefox/89.0',
        'Content-Type': 'application/json',
        Accept: 'application/json, text/javascript, */*; q=0.01',
      },
      cookies: { sessao: 'c1' },
      json: {
        __RequestVerificationToken: 'tok-1',
        IsMobile: 'false',
        NomeAdvo: '',
        Insc: '185929',
        Uf: 'MG',
        TipoInsc: '',
      },
    });
    expect(requisitar.mock.calls[1][0]).toBe('GET');
    expect(requisitar.mock.calls[1][1]).toBe(`${CNA}/Home/Detail/abc`);
  });

  it('sem sociedades finaliza com has_society=false e preserva campos desconhecidos', async () => {
    const { cliente } = criarCliente((metodo) => (metodo === 'POST' ? buscaOk : { Success: true, Data: { Sociedades: null } }));

    const { registro: resultado, sessaoValida } = await criarService(cliente, semSociedades).enriquecer(
      registro,
      'MG',
      '185929',
      {},
      'tok',
      { atrasoMs: 0 }
    );

    expect(sessaoValida).toBe(true);
    expect(resultado).toEqual({
      ...registro,
      processed: true,
      has_society: false,
      corrected_full_name: null,
      society_link: `${CNA}/Home/Detail/abc`,
      society_basic_details: [],
      society_complete_details: [],
      state: 'MG',
    });
  });

  it('nome igual ignorando caixa nao gera correcao; nome diferente vai para corrected_full_name', async () => {
    const { cliente: igual } = criarCliente((m) => (m === 'POST' ? buscaOk : { Success: true, Data: {} }));
    const r1 = await criarService(igual, semSociedades).enriquecer(registro, 'MG', '185929', {}, 'tok', { atrasoMs: 0 });
    expect(r1.registro.corrected_full_name).toBeNull();

    const { cliente: diferente } = criarCliente((m) =>
      m === 'POST'
        ? { Success: true, Data: [{ Nome: ' JOAO DA SILVA SANTOS ', DetailUrl: '/d' }] }
        : { Success: true, Data: {} }
    );
    const r2 = await criarService(diferente, semSociedades).enriquecer(registro, 'MG', '185929', {}, 'tok', { atrasoMs: 0 });
    expect(r2.registro.corrected_full_name).toBe('JOAO DA SILVA SANTOS');
    expect(r2.registro.full_name).toBe('Joao da Silva');
  });

  it('busca sem resultados e tentada de novo e depois registrada como erro, sem invalidar a sessao', async () => {
    const { cliente, requisitar } = criarCliente(() => ({ Success: true, Data: [] }));
    const registrarErro = vi.fn();

    const resultado = await criarService(cliente, semSociedades, registrarErro).enriquecer(registro, 'MG', '185929', {}, 'tok', {
      tentativas: 3,
      atrasoMs: 0,
    });

    expect(requisitar).toHaveBeenCalledTimes(3);
    expect(resultado.sessaoValida).toBe(true);
    expect(resultado.registro.processed).toBe(true);
    expect(resultado.registro.has_society).toBe(false);
    expect(registrarErro).toHaveBeenCalledWith('Busca falhou ou sem resultados para MG 185929');
  });

  it('falha de autenticacao no detalhe devolve sessaoValida=false imediatamente', async () => {
    const requisitar = vi.fn(async (metodo: MetodoHttp, url: string) => {
      if (metodo === 'POST') return { data: buscaOk };
      throw new FalhaTransporteError(`Requisicao falhou apos 4 tentativas: HTTP 419 em ${url}`, 419);
    });
    const registrarErro = vi.fn();

    const resultado = await criarService({ requisitar }, semSociedades, registrarErro).enriquecer(
      registro,
      'MG',
      '185929',
      {},
      'tok',
      { atrasoMs: 0 }
    );

    expect(resultado.sessaoValida).toBe(false);
    expect(requisitar).toHaveBeenCalledTimes(2);
    expect(registrarErro).not.toHaveBeenCalled();
  });

  it('guarda os stubs e os detalhes na ordem original, pulando falhas', async () => {
    const stubs = [sociedade(1), sociedade(2), sociedade(3)];
    const { cliente } = criarCliente((m) => (m === 'POST' ? buscaOk : { Success: true, Data: { Sociedades: stubs } }));

    const buscarDetalhe = vi.fn(async (stub: SociedadeBasica) => {
      // a primeira termina por ultimo
      if (stub.IdtSoci === 1) await new Promise((resolve) => setTimeout(resolve, 20));
      if (stub.IdtSoci === 2) throw new Error('render caiu');
      return completa(stub);
    });
    const registrarErro = vi.fn();

    const { registro: resultado } = await criarService(cliente, { buscarDetalhe }, registrarErro).enriquecer(
      registro,
      'MG',
      '185929',
      {},
      'tok',
      { atrasoMs: 0 }
    );

    expect(resultado.has_society).toBe(true);
    expect(resultado.society_basic_details).toEqual(stubs);
    expect(resultado.society_complete_details?.map((c) => c.basic_info.IdtSoci)).toEqual([1, 3]);
    expect(registrarErro).toHaveBeenCalledWith('Erro processando sociedade 1: render caiu');
    expect(buscarDetalhe).toHaveBeenCalledWith(stubs[0], 'MG', '185929', 'Joao da Silva');
  });

  it('erros de transporte esgotados viram entrada no log e o registro parcial e devolvido', async () => {
    const requisitar = vi.fn(async (): Promise<{ data: unknown }> => {
      throw new FalhaTransporteError('Requisicao falhou apos 4 tentativas: proxy error', null);
    });
    const registrarErro = vi.fn();

    const resultado = await criarService({ requisitar }, semSociedades, registrarErro).enriquecer(
      registro,
      'MG',
      '185929',
      {},
      'tok',
      { tentativas: 2, atrasoMs: 0 }
    );

    expect(resultado.sessaoValida).toBe(true);
    expect(resultado.registro.processed).toBe(true);
    expect(requisitar).toHaveBeenCalledTimes(2);
    expect(registrarErro).toHaveBeenCalledWith(
      'Maximo de tentativas excedido para MG 185929: Requisicao falhou apos 4 tentativas: proxy error'
    );
  });
});

describe('erroDeAutenticacao', () => {
  it('reconhece status 401/403/419 e mensagens com token', () => {
    expect(erroDeAutenticacao(new FalhaTransporteError('x', 401))).toBe(true);
    expect(erroDeAutenticacao(new FalhaTransporteError('x', 403))).toBe(true);
    expect(erroDeAutenticacao(new FalhaTransporteError('Invalid Token', 500))).toBe(true);
    expect(erroDeAutenticacao(new FalhaTransporteError('HTTP 500', 500))).toBe(false);
    expect(erroDeAutenticacao(new Error('token'))).toBe(false);
  });
});
