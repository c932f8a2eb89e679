import { z } from 'zod';

// Sociedade como devolvida pelo endpoint de detalhe do CNA (campos da API)
export const sociedadeBasicaSchema = z
  .object({
    Insc: z.string(),
    NomeSoci: z.string(),
    IdtSoci: z.union([z.string(), z.number()]),
    SiglUf: z.string(),
    Url: z.string(),
  })
  .passthrough();

export type SociedadeBasica = z.infer<typeof sociedadeBasicaSchema>;

export interface SocioModal {
  numero: string;
  nome: string;
  nome_social: string;
  tipo: string;
  cna_link: string;
}

export interface DadosModal {
  firm_name: string | null;
  inscricao: string | null;
  estado: string | null;
  situacao: string | null;
  endereco: string | null;
  telefones: string | null;
  socios: SocioModal[];
}

export interface ExtracaoModal {
  extraction_method: 'specific_modal_parser';
  content_loaded: boolean;
  timestamp: string;
  url: string;
  modal_data?: DadosModal;
  error?: string;
  extraction_success: number;
}

export interface SociedadeCompleta {
  lawyer_info: {
    lawyer_name: string;
    lawyer_state: string;
    lawyer_oab_number: string;
  };
  basic_info: {
    Insc: string;
    NomeSoci: string;
    IdtSoci: string | number;
    SiglUf: string;
    source_url: string;
  };
  modal_data: ExtracaoModal;
  processed_at: string;
}

const sociedadeCompletaSchema = z.custom<SociedadeCompleta>(
  (valor) => typeof valor === 'object' && valor !== null && !Array.isArray(valor),
  { message: 'sociedade completa deve ser um objeto' }
);

const numeroOuTexto = z.union([z.string(), z.number()]);

// Campos desconhecidos sao preservados (passthrough)
export const registroAdvogadoSchema = z
  .object({
    id: numeroOuTexto.nullish(),
    full_name: z.string().nullish(),
    oab_number: numeroOuTexto.nullish(),
    insc: numeroOuTexto.nullish(),
    state: z.string().nullish(),
    oab_id: z.string().nullish(),
    processed: z.boolean().nullish(),
    has_society: z.boolean().nullish(),
    corrected_full_name: z.string().nullish(),
    society_link: z.string().nullish(),
    society_basic_details: z.array(sociedadeBasicaSchema).nullish(),
    society_complete_details: z.array(sociedadeCompletaSchema).nullish(),
  })
  .passthrough();

export type RegistroAdvogado = z.infer<typeof registroAdvogadoSchema>;

export const arquivoBatchSchema = z.array(registroAdvogadoSchema);

// Respostas do CNA: { Success, Data }
export const respostaBuscaSchema = z.object({
  Success: z.boolean(),
  Data: z
    .array(
      z
        .object({
          Nome: z.string().nullish(),
          DetailUrl: z.string(),
        })
        .passthrough()
    )
    .nullish(),
});

export type RespostaBusca = z.infer<typeof respostaBuscaSchema>;

export const respostaDetalheSchema = z.object({
  Success: z.boolean(),
  Data: z
    .object({
      Sociedades: z.array(sociedadeBasicaSchema).nullish(),
    })
    .passthrough()
    .nullish(),
});

export type RespostaDetalhe = z.infer<typeof respostaDetalheSchema>;
