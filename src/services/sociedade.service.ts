import type { ExtracaoModal, SociedadeBasica, SociedadeCompleta } from '../types.js';
import { mensagemErro } from '../utils/erros.js';

export interface ExtratorModal {
  renderizarEExtrair(url: string): Promise<ExtracaoModal>;
}

export interface GravadorDetalhe {
  salvarComBackup(dados: unknown, nomeArquivo: string): Promise<string | null>;
}

export interface OpcoesSociedadeService {
  render: ExtratorModal;
  armazenamento: GravadorDetalhe;
  cnaUrl?: string;
  relogio?: () => Date;
  registrarErro?: (mensagem: string) => void;
}

export function sanitizarNomeArquivo(nome: string): string {
  return nome.replace(/[<>:"/\\|?*]/g, '_');
}

export class SociedadeService {
  private readonly render: ExtratorModal;
  private readonly armazenamento: GravadorDetalhe;
  private readonly cnaUrl: string;
  private readonly relogio: () => Date;
  private readonly registrarErro: (mensagem: string) => void;

  constructor(opcoes: OpcoesSociedadeService) {
    this.render = opcoes.render;
    this.armazenamento = opcoes.armazenamento;
    this.cnaUrl = opcoes.cnaUrl ?? 'https://cna.oab.org.br';
    this.relogio = opcoes.relogio ?? (() => new Date());
    this.registrarErro = opcoes.registrarErro ?? (() => undefined);
  }

  /**
   * Renderiza o modal da sociedade e monta o registro completo.
   * Retorna null (erro registrado) quando o modal nao carrega.
   */
  async buscarDetalhe(
    sociedade: SociedadeBasica,
    estado: string,
    numeroOab: string,
    nomeAdvogado: string
  ): Promise<SociedadeCompleta | null> {
    try {
      console.log(`[Sociedade] Processando sociedade: ${sociedade.NomeSoci} (${sociedade.Insc})`);

      const url = this.cnaUrl + sociedade.Url;
      const extracao = await this.render.renderizarEExtrair(url);

      if (!extracao.content_loaded) {
        this.falhar(`Falha ao obter dados do modal da sociedade ${sociedade.Insc} apos todas as tentativas`);
        return null;
      }

      const agora = this.relogio();
      const detalhe: SociedadeCompleta = {
        lawyer_info: {
          lawyer_name: nomeAdvogado,
          lawyer_state: estado,
          lawyer_oab_number: numeroOab,
        },
        basic_info: {
          Insc: sociedade.Insc,
          NomeSoci: sociedade.NomeSoci,
          IdtSoci: sociedade.IdtSoci,
          SiglUf: sociedade.SiglUf,
          source_url: url,
        },
        modal_data: extracao,
        processed_at: agora.toISOString(),
      };

      const nomeArquivo = `sociedade_${estado}_${numeroOab}_${sanitizarNomeArquivo(sociedade.Insc)}_${Math.floor(agora.getTime() / 1000)}.json`;
      const salvo = await this.armazenamento.salvarComBackup(detalhe, nomeArquivo);

      if (salvo) {
        console.log(`[Sociedade] Sociedade salva: ${nomeArquivo}`);
      } else {
        console.warn(`[Sociedade] Problema ao salvar sociedade: ${nomeArquivo}`);
      }

      return detalhe;
    } catch (error) {
      this.falhar(`Erro processando sociedade ${sociedade.Insc}: ${mensagemErro(error)}`);
      return null;
    }
  }

  private falhar(mensagem: string): void {
    console.error(`[Sociedade] ERRO: ${mensagem}`);
    this.registrarErro(mensagem);
  }
}
