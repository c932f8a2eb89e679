import type { RegistroAdvogado } from '../types.js';
import { estadoDoOabId } from './estado.js';

/**
 * oab_id: UF vem do oab_id e registros com estado divergente sao limpos
 * heuristico: UF vem do campo state com limpeza tolerante
 */
export type ModoEstado = 'oab_id' | 'heuristico';

export type MotivoProcessamento =
  | 'ESTADO_INCONSISTENTE'
  | 'NAO_PROCESSADO'
  | 'SOCIEDADE_INCOMPLETA'
  | 'SOCIEDADE_INDEFINIDA'
  | 'COMPLETO';

export interface Classificacao {
  processar: boolean;
  motivo: MotivoProcessamento;
}

export const DESCRICAO_MOTIVO: Record<MotivoProcessamento, string> = {
  ESTADO_INCONSISTENTE: 'estado inconsistente com oab_id',
  NAO_PROCESSADO: 'nao processado',
  SOCIEDADE_INCOMPLETA: 'sociedades incompletas',
  SOCIEDADE_INDEFINIDA: 'status de sociedade nao determinado',
  COMPLETO: 'completo',
};

/**
 * Decide se o registro precisa ser (re)processado. A primeira regra que casa vence.
 */
export function classificarRegistro(registro: RegistroAdvogado, modo: ModoEstado = 'oab_id'): Classificacao {
  if (modo === 'oab_id') {
    const estadoCorreto = estadoDoOabId(registro.oab_id);
    if (estadoCorreto && registro.state !== estadoCorreto) {
      return { processar: true, motivo: 'ESTADO_INCONSISTENTE' };
    }
  }

  if (registro.processed !== true) {
    return { processar: true, motivo: 'NAO_PROCESSADO' };
  }

  if (registro.has_society === true) {
    const basicas = registro.society_basic_details ?? [];
    const completas = registro.society_complete_details ?? [];
    if (basicas.length === 0 || completas.length === 0) {
      return { processar: true, motivo: 'SOCIEDADE_INCOMPLETA' };
    }
  }

  if (registro.has_society !== true && registro.has_society !== false) {
    return { processar: true, motivo: 'SOCIEDADE_INDEFINIDA' };
  }

  return { processar: false, motivo: 'COMPLETO' };
}

/**
 * Remove dados de sociedade vinculados a UF errada
 */
export function limparRegistroInconsistente(registro: RegistroAdvogado): RegistroAdvogado {
  const {
    corrected_full_name: _nomeCorrigido,
    society_link: _link,
    society_basic_details: _basicas,
    society_complete_details: _completas,
    ...resto
  } = registro;

  return {
    ...resto,
    processed: false,
    has_society: false,
  };
}

export interface RegistroParaProcessar {
  registro: RegistroAdvogado;
  motivo: MotivoProcessamento;
}

export interface ResultadoSeparacao {
  paraProcessar: RegistroParaProcessar[];
  pulados: RegistroAdvogado[];
  inconsistentes: number;
}

/**
 * Separa o batch entre registros a processar e registros completos (mantendo a ordem de entrada)
 */
export function separarRegistros(registros: RegistroAdvogado[], modo: ModoEstado): ResultadoSeparacao {
  const resultado: ResultadoSeparacao = { paraProcessar: [], pulados: [], inconsistentes: 0 };

  for (const registro of registros) {
    const { processar, motivo } = classificarRegistro(registro, modo);

    if (!processar) {
      resultado.pulados.push(registro);
      continue;
    }

    if (motivo === 'ESTADO_INCONSISTENTE') {
      resultado.inconsistentes++;
      console.log(
        `[Elegibilidade] Estado corrigido: '${registro.state}' -> '${estadoDoOabId(registro.oab_id)}' (oab_id: ${registro.oab_id}), dados de sociedade descartados`
      );
      resultado.paraProcessar.push({ registro: limparRegistroInconsistente(registro), motivo });
    } else {
      resultado.paraProcessar.push({ registro, motivo });
    }
  }

  return resultado;
}
