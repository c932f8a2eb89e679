import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { RegistroAdvogado, SociedadeBasica, SociedadeCompleta } from '../types.js';
import { classificarRegistro, limparRegistroInconsistente, separarRegistros } from './elegibilidade.js';

const basica: SociedadeBasica = {
  Insc: '1234',
  NomeSoci: 'Silva e Souza Advogados',
  IdtSoci: 987,
  SiglUf: 'SP',
  Url: '/Home/Sociedade/987',
};

const completa: SociedadeCompleta = {
  lawyer_info: { lawyer_name: 'Ana Silva', lawyer_state: 'SP', lawyer_oab_number: '1' },
  basic_info: {
    Insc: '1234',
    NomeSoci: 'Silva e Souza Advogados',
    IdtSoci: 987,
    SiglUf: 'SP',
    source_url: 'https://cna.oab.org.br/Home/Sociedade/987',
  },
  modal_data: {
    extraction_method: 'specific_modal_parser',
    content_loaded: true,
    timestamp: '2026-01-01T00:00:00.000Z',
    url: 'https://cna.oab.org.br/Home/Sociedade/987',
    extraction_success: 5,
  },
  processed_at: '2026-01-01T00:00:00.000Z',
};

function registroCompleto(extra: Partial<RegistroAdvogado> = {}): RegistroAdvogado {
  return {
    id: 1,
    full_name: 'Ana Silva',
    oab_number: '1',
    state: 'SP',
    oab_id: 'SP_1',
    processed: true,
    has_society: true,
    society_basic_details: [basica],
    society_complete_details: [completa],
    ...extra,
  };
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
});

describe('classificarRegistro', () => {
  it('registro completo nao precisa de processamento', () => {
    expect(classificarRegistro(registroCompleto())).toEqual({ processar: false, motivo: 'COMPLETO' });
  });

  it('registro sem sociedade e processado esta completo', () => {
    const registro = registroCompleto({ has_society: false, society_basic_details: [], society_complete_details: [] });
    expect(classificarRegistro(registro).motivo).toBe('COMPLETO');
  });

  it('processed=false sempre resulta em NAO_PROCESSADO', () => {
    expect(classificarRegistro(registroCompleto({ processed: false })).motivo).toBe('NAO_PROCESSADO');
    expect(classificarRegistro(registroCompleto({ processed: false, has_society: undefined })).motivo).toBe('NAO_PROCESSADO');
    expect(classificarRegistro(registroCompleto({ processed: undefined })).motivo).toBe('NAO_PROCESSADO');
  });

  it('has_society=true com lista vazia e SOCIEDADE_INCOMPLETA', () => {
    expect(classificarRegistro(registroCompleto({ society_complete_details: [] })).motivo).toBe('SOCIEDADE_INCOMPLETA');
    expect(classificarRegistro(registroCompleto({ society_basic_details: undefined })).motivo).toBe('SOCIEDADE_INCOMPLETA');
  });

  it('has_society ausente e SOCIEDADE_INDEFINIDA', () => {
    expect(classificarRegistro(registroCompleto({ has_society: undefined })).motivo).toBe('SOCIEDADE_INDEFINIDA');
    expect(classificarRegistro(registroCompleto({ has_society: null })).motivo).toBe('SOCIEDADE_INDEFINIDA');
  });

  it('estado divergente do oab_id tem prioridade sobre tudo', () => {
    const registro = registroCompleto({ oab_id: 'SP_1', state: 'RJ' });
    expect(classificarRegistro(registro)).toEqual({ processar: true, motivo: 'ESTADO_INCONSISTENTE' });
  });

  it('no modo heuristico a divergencia de estado nao e verificada', () => {
    const registro = registroCompleto({ oab_id: 'SP_1', state: 'RJ' });
    expect(classificarRegistro(registro, 'heuristico')).toEqual({ processar: false, motivo: 'COMPLETO' });
  });

  it('oab_id invalido nao dispara a regra de estado', () => {
    const registro = registroCompleto({ oab_id: 'XX_1', state: 'RJ' });
    expect(classificarRegistro(registro).motivo).toBe('COMPLETO');
  });
});

describe('limparRegistroInconsistente', () => {
  it('remove todos os campos derivados e reinicia os flags', () => {
    const limpo = limparRegistroInconsistente(
      registroCompleto({ state: 'RJ', corrected_full_name: 'ANA SILVA', society_link: 'https://cna.oab.org.br/x' })
    );

    expect(limpo.processed).toBe(false);
    expect(limpo.has_society).toBe(false);
    expect('society_basic_details' in limpo).toBe(false);
    expect('society_complete_details' in limpo).toBe(false);
    expect('corrected_full_name' in limpo).toBe(false);
    expect('society_link' in limpo).toBe(false);
    expect(limpo.full_name).toBe('Ana Silva');
    expect(limpo.oab_id).toBe('SP_1');
  });

  it('preserva campos desconhecidos', () => {
    const limpo = limparRegistroInconsistente({ ...registroCompleto(), foto_url: 'https://example.com/a.jpg' });
    expect(limpo.foto_url).toBe('https://example.com/a.jpg');
  });
});

describe('separarRegistros', () => {
  it('classifica um batch com registro completo, inconsistente e nao processado', () => {
    const completo = registroCompleto({ id: 1 });
    const inconsistente = registroCompleto({ id: 2, oab_id: 'SP_2', state: 'RJ' });
    const naoProcessado: RegistroAdvogado = { id: 3, full_name: 'Joao Lima', oab_number: '3', state: 'MG', oab_id: 'MG_3' };

    const resultado = separarRegistros([completo, inconsistente, naoProcessado], 'oab_id');

    expect(resultado.paraProcessar).toHaveLength(2);
    expect(resultado.paraProcessar.map((p) => p.motivo)).toEqual(['ESTADO_INCONSISTENTE', 'NAO_PROCESSADO']);
    expect(resultado.pulados).toEqual([completo]);
    expect(resultado.pulados[0]).toBe(completo);
    expect(resultado.inconsistentes).toBe(1);

    const limpo = resultado.paraProcessar[0].registro;
    expect(limpo.id).toBe(2);
    expect(limpo.processed).toBe(false);
    expect(limpo.society_basic_details).toBeUndefined();
  });
});
