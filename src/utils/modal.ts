import * as cheerio from 'cheerio';
import type { DadosModal, SocioModal } from '../types.js';

const ROTULOS = {
  inscricao: 'Inscrição:',
  estado: 'Estado:',
  endereco: 'Endereço:',
  telefones: 'Telefones:',
} as const;

function limparTexto(texto: string): string {
  return texto.replace(/\s+/g, ' ').trim();
}

/**
 * Extrai os dados do modal de sociedade do CNA a partir do HTML renderizado.
 * Campos ausentes ficam null.
 */
export function extrairDadosModal(html: string): DadosModal {
  const $ = cheerio.load(html || '');

  // Campo rotulado: <b>Rotulo:</b> valor, dentro do mesmo elemento pai
  const campoRotulado = (rotulo: string): string | null => {
    const negrito = $('b')
      .filter((_, el) => $(el).text().includes(rotulo))
      .first();
    if (negrito.length === 0) return null;

    return limparTexto(negrito.parent().text().replace(rotulo, ''));
  };

  const titulo = $('.modal-title b').first();
  const situacao = $('.label').first();

  const socios: SocioModal[] = [];
  $('.socContainer tr').each((_, linha) => {
    const colunas = $(linha).find('td');
    if (colunas.length < 4) return;

    socios.push({
      numero: limparTexto(colunas.eq(0).text()),
      nome: limparTexto(colunas.eq(1).text()),
      nome_social: limparTexto(colunas.eq(2).text()),
      tipo: limparTexto(colunas.eq(3).text()),
      cna_link: $(linha).attr('data-cnalink') ?? '',
    });
  });

  return {
    firm_name: titulo.length > 0 ? limparTexto(titulo.text()) : null,
    inscricao: campoRotulado(ROTULOS.inscricao),
    estado: campoRotulado(ROTULOS.estado),
    situacao: situacao.length > 0 ? limparTexto(situacao.text()) : null,
    endereco: campoRotulado(ROTULOS.endereco),
    telefones: campoRotulado(ROTULOS.telefones),
    socios,
  };
}

/**
 * Le o token anti-forgery do HTML estatico da pagina inicial
 */
export function extrairTokenDoHtml(html: string, nomeCampo: string = '__RequestVerificationToken'): string | null {
  const $ = cheerio.load(html || '');
  const valor = $(`input[name="${nomeCampo}"]`).first().attr('value');
  return valor ? valor : null;
}
