import type { RegistroAdvogado } from '../types.js';
import { estadoDoOabId, limparEstado } from './estado.js';

export interface EstadoInconsistente {
  id: string | number;
  nome: string;
  oabId: string;
  estadoAtual: string | null;
  // null quando o state gravado nao e uma UF valida
  estadoAtualLimpo: string | null;
  estadoCorreto: string;
}

export interface ProblemaRegistro {
  id: string | number;
  nome: string;
  estado: string | null;
  oabId: string | null;
}

export interface SociedadeIncompleta extends ProblemaRegistro {
  basicas: number;
  completas: number;
}

export interface RelatorioVerificacao {
  total: number;
  totalProblemas: number;
  estadosInconsistentes: EstadoInconsistente[];
  semOabId: ProblemaRegistro[];
  naoProcessados: ProblemaRegistro[];
  sociedadesIncompletas: SociedadeIncompleta[];
}

/**
 * Diagnostico de um arquivo ja processado. Um registro pode contar em mais de uma categoria.
 */
export function verificarRegistros(registros: readonly RegistroAdvogado[]): RelatorioVerificacao {
  const relatorio: RelatorioVerificacao = {
    total: registros.length,
    totalProblemas: 0,
    estadosInconsistentes: [],
    semOabId: [],
    naoProcessados: [],
    sociedadesIncompletas: [],
  };

  registros.forEach((registro, indice) => {
    const base: ProblemaRegistro = {
      id: registro.id ?? `Index_${indice}`,
      nome: registro.full_name ?? 'Nome_Desconhecido',
      estado: registro.state ?? null,
      oabId: registro.oab_id ?? null,
    };

    if (registro.oab_id) {
      const estadoCorreto = estadoDoOabId(registro.oab_id);
      const estadoAtualLimpo = limparEstado(registro.state);

      if (estadoCorreto && estadoAtualLimpo !== estadoCorreto) {
        relatorio.estadosInconsistentes.push({
          id: base.id,
          nome: base.nome,
          oabId: registro.oab_id,
          estadoAtual: base.estado,
          estadoAtualLimpo,
          estadoCorreto,
        });
        relatorio.totalProblemas++;
      }
    } else {
      relatorio.semOabId.push(base);
      relatorio.totalProblemas++;
    }

    if (registro.processed !== true) {
      relatorio.naoProcessados.push(base);
      relatorio.totalProblemas++;
    }

    if (registro.has_society === true) {
      const basicas = registro.society_basic_details?.length ?? 0;
      const completas = registro.society_complete_details?.length ?? 0;
      if (basicas === 0 || completas === 0) {
        relatorio.sociedadesIncompletas.push({ ...base, basicas, completas });
        relatorio.totalProblemas++;
      }
    }
  });

  return relatorio;
}
