export class AppError extends Error {
  statusCode: number;

  constructor(message: string, statusCode: number = 500) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
  }
}

/**
 * Variaveis de ambiente obrigatorias ausentes ou invalidas (fatal na inicializacao)
 */
export class ConfiguracaoError extends AppError {}

/**
 * Falha de transporte apos esgotar as tentativas (proxy, timeout, HTTP nao-2xx)
 */
export class FalhaTransporteError extends AppError {
  statusHttp: number | null;

  constructor(message: string, statusHttp: number | null = null) {
    super(message, statusHttp ?? 502);
    this.statusHttp = statusHttp;
  }
}

export class NavegadorIndisponivelError extends AppError {
  constructor(message: string = 'Nao foi possivel abrir nenhum navegador com proxy') {
    super(message, 503);
  }
}

export class TokenNaoEncontradoError extends AppError {
  constructor(message: string) {
    super(message, 503);
  }
}

export function mensagemErro(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
