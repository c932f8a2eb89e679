import { chromium, firefox, type Browser, type BrowserContextOptions, type LaunchOptions } from 'playwright';
import { USER_AGENT_PADRAO, type ProxyConfig } from '../config/env.js';
import type { ExtracaoModal } from '../types.js';
import { mensagemErro, NavegadorIndisponivelError, TokenNaoEncontradoError } from '../utils/erros.js';
import { extrairDadosModal, extrairTokenDoHtml } from '../utils/modal.js';
import { sleep } from '../utils/pool.js';

const NOME_CAMPO_TOKEN = '__RequestVerificationToken';

export interface LocalizadorRender {
  waitFor(opcoes: { state: 'attached' | 'visible'; timeout: number }): Promise<void>;
  getAttribute(nome: string): Promise<string | null>;
  innerHTML(): Promise<string>;
}

export interface PaginaRender {
  goto(url: string, opcoes: { waitUntil: 'domcontentloaded'; timeout: number }): Promise<unknown>;
  locator(seletor: string): { first(): LocalizadorRender };
  waitForTimeout(ms: number): Promise<void>;
  content(): Promise<string>;
}

export interface SessaoRender {
  pagina: PaginaRender;
  cookies(): Promise<Array<{ name: string; value: string }>>;
  fechar(): Promise<void>;
}

export interface NavegadorRender {
  novaSessao(proxy: ProxyConfig): Promise<SessaoRender>;
  conectado(): boolean;
  fechar(): Promise<void>;
}

export interface BackendNavegador {
  nome: string;
  // userAgent do contexto; o backend Firefox mantem o seu proprio
  lancar(userAgent: string): Promise<NavegadorRender>;
}

export interface OpcoesRenderService {
  proxy: ProxyConfig;
  cnaUrl?: string;
  backends?: BackendNavegador[];
  esperaEstabilizarMs?: number;
  userAgent?: string;
}

export interface OpcoesTentativas {
  tentativas?: number;
  atrasoMs?: number;
}

export interface CookiesEToken {
  cookies: Record<string, string>;
  token: string;
}

function proxyPlaywright(proxy: ProxyConfig): NonNullable<LaunchOptions['proxy']> {
  return {
    server: `${proxy.protocolo}://${proxy.host}:${proxy.porta}`,
    username: proxy.usuario || undefined,
    password: proxy.senha || undefined,
  };
}

// Um contexto por sessao, com o proxy aplicado no contexto
function adaptarBrowser(browser: Browser, opcoesContexto: BrowserContextOptions, initScript?: string): NavegadorRender {
  return {
    async novaSessao(proxy) {
      const context = await browser.newContext({ ...opcoesContexto, proxy: proxyPlaywright(proxy) });
      try {
        const page = await context.newPage();
        if (initScript) {
          await page.addInitScript(initScript);
        }
        page.setDefaultNavigationTimeout(45000);

        return {
          pagina: page,
          cookies: () => context.cookies(),
          fechar: () => context.close(),
        };
      } catch (error) {
        await context.close();
        throw error;
      }
    },
    conectado: () => browser.isConnected(),
    fechar: () => browser.close(),
  };
}

// Backend A: Chromium com sinais de automacao suprimidos
export const backendChromium: BackendNavegador = {
  nome: 'chromium',
  async lancar(userAgent) {
    const browser = await chromium.launch({
      headless: true,
      ignoreDefaultArgs: ['--enable-automation'],
      args: [
        '--no-sandbox',
        '--disable-setuid-sandbox',
        '--disable-dev-shm-usage',
        '--disable-gpu',
        '--ignore-certificate-errors',
        '--disable-blink-features=AutomationControlled',
        '--disable-extensions',
      ],
    });

    return adaptarBrowser(
      browser,
      {
        viewport: { width: 1920, height: 1080 },
        userAgent,
        ignoreHTTPSErrors: true,
        javaScriptEnabled: true,
      },
      "Object.defineProperty(navigator, 'webdriver', { get: () => undefined })"
    );
  },
};

// Backend B: Firefox
export const backendFirefox: BackendNavegador = {
  nome: 'firefox',
  async lancar() {
    const browser = await firefox.launch({
      headless: true,
      firefoxUserPrefs: {
        'dom.webdriver.enabled': false,
        useAutomationExtension: false,
      },
    });

    return adaptarBrowser(browser, {
      viewport: { width: 1920, height: 1080 },
      userAgent: 'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:119.0) Gecko/20100101 Firefox/119.0',
      ignoreHTTPSErrors: true,
    });
  },
};

export class RenderService {
  private navegador: NavegadorRender | null = null;
  private abrindo: Promise<NavegadorRender> | null = null;

  private readonly proxy: ProxyConfig;
  private readonly cnaUrl: string;
  private readonly backends: BackendNavegador[];
  private readonly esperaEstabilizarMs: number;
  private readonly userAgent: string;

  constructor(opcoes: OpcoesRenderService) {
    this.proxy = opcoes.proxy;
    this.cnaUrl = opcoes.cnaUrl ?? 'https://cna.oab.org.br';
    this.backends = opcoes.backends ?? [backendChromium, backendFirefox];
    this.esperaEstabilizarMs = opcoes.esperaEstabilizarMs ?? 3000;
    this.userAgent = opcoes.userAgent ?? USER_AGENT_PADRAO;
  }

  /**
   * Abre o navegador tentando os backends em ordem (Chromium, depois Firefox)
   */
  async abrirNavegador(): Promise<NavegadorRender> {
    if (this.navegador && this.navegador.conectado()) return this.navegador;

    // Workers concorrentes aguardam a mesma abertura
    if (!this.abrindo) {
      this.abrindo = this.lancarComFallback().finally(() => {
        this.abrindo = null;
      });
    }

    this.navegador = await this.abrindo;
    return this.navegador;
  }

  async finalizar(): Promise<void> {
    const navegador = this.navegador;
    this.navegador = null;
    if (navegador) {
      await navegador.fechar();
    }
  }

  /**
   * Obtem cookies e o token anti-forgery da pagina inicial do CNA
   */
  async obterCookiesEToken(opcoes: OpcoesTentativas = {}): Promise<CookiesEToken> {
    const tentativas = opcoes.tentativas ?? 4;
    const atrasoMs = opcoes.atrasoMs ?? 2000;
    let ultimoErro = 'Erro desconhecido';

    for (let tentativa = 1; tentativa <= tentativas; tentativa++) {
      let sessao: SessaoRender | null = null;

      try {
        console.log(`[Render] Tentativa ${tentativa} de obter cookies...`);
        sessao = await this.abrirSessao();
        const { pagina } = sessao;

        await pagina.goto(`${this.cnaUrl}/`, { waitUntil: 'domcontentloaded', timeout: 45000 });
        await pagina.locator('body').first().waitFor({ state: 'attached', timeout: 20000 });
        await pagina.waitForTimeout(this.esperaEstabilizarMs);

        const cookies: Record<string, string> = {};
        for (const cookie of await sessao.cookies()) {
          cookies[cookie.name] = cookie.value;
        }

        const token = await this.lerToken(pagina);
        if (!token) {
          throw new TokenNaoEncontradoError('Nao foi possivel encontrar o token de verificacao');
        }

        console.log('[Render] Cookies e token obtidos com sucesso');
        return { cookies, token };
      } catch (error) {
        ultimoErro = mensagemErro(error);
        console.error(`[Render] Tentativa ${tentativa} falhou: ${ultimoErro}`);

        if (tentativa < tentativas) {
          console.log(`[Render] Aguardando ${atrasoMs / 1000}s antes da proxima tentativa...`);
          await sleep(atrasoMs);
        }
      } finally {
        await this.fecharSessao(sessao);
      }
    }

    throw new TokenNaoEncontradoError(`Falha ao obter cookies apos ${tentativas} tentativas: ${ultimoErro}`);
  }

  /**
   * Renderiza a pagina de detalhe e extrai o modal. Nunca lanca: falha vira content_loaded=false.
   */
  async renderizarEExtrair(
    url: string,
    opcoes: OpcoesTentativas & { esperaMs?: number } = {}
  ): Promise<ExtracaoModal> {
    const tentativas = opcoes.tentativas ?? 4;
    const atrasoMs = opcoes.atrasoMs ?? 2000;
    const esperaMs = opcoes.esperaMs ?? 25000;
    let ultimoErro = 'Erro desconhecido';

    for (let tentativa = 1; tentativa <= tentativas; tentativa++) {
      let sessao: SessaoRender | null = null;

      try {
        console.log(`[Render] Tentativa ${tentativa}: navegando para ${url}`);
        sessao = await this.abrirSessao();
        const { pagina } = sessao;

        await pagina.goto(url, { waitUntil: 'domcontentloaded', timeout: 45000 });

        const modal = pagina.locator('.modal-content').first();
        await modal.waitFor({ state: 'visible', timeout: esperaMs });
        await pagina.waitForTimeout(this.esperaEstabilizarMs);

        const html = `<div class="modal-content">${await modal.innerHTML()}</div>`;
        const dados = extrairDadosModal(html);

        console.log(`[Render] Modal extraido: ${dados.firm_name ?? 'N/A'} | Inscricao: ${dados.inscricao ?? 'N/A'} | Socios: ${dados.socios.length}`);

        return {
          extraction_method: 'specific_modal_parser',
          content_loaded: true,
          timestamp: new Date().toISOString(),
          url,
          modal_data: dados,
          extraction_success: dados.firm_name ? 5 : 3,
        };
      } catch (error) {
        ultimoErro = mensagemErro(error);
        console.error(`[Render] Tentativa ${tentativa}: modal nao carregou em ${url}: ${ultimoErro}`);

        if (tentativa < tentativas) {
          await sleep(atrasoMs);
        }
      } finally {
        await this.fecharSessao(sessao);
      }
    }

    return {
      extraction_method: 'specific_modal_parser',
      content_loaded: false,
      error: ultimoErro,
      timestamp: new Date().toISOString(),
      url,
      extraction_success: 0,
    };
  }

  private async lancarComFallback(): Promise<NavegadorRender> {
    for (const backend of this.backends) {
      try {
        const navegador = await backend.lancar(this.userAgent);
        console.log(`[Render] Navegador ${backend.nome} iniciado`);
        return navegador;
      } catch (error) {
        console.error(`[Render] Falha ao iniciar ${backend.nome}: ${mensagemErro(error)}`);
      }
    }

    throw new NavegadorIndisponivelError();
  }

  private async abrirSessao(): Promise<SessaoRender> {
    const navegador = await this.abrirNavegador();
    return navegador.novaSessao(this.proxy);
  }

  private async fecharSessao(sessao: SessaoRender | null): Promise<void> {
    if (!sessao) return;
    try {
      await sessao.fechar();
    } catch (error) {
      console.warn(`[Render] Erro ao fechar sessao: ${mensagemErro(error)}`);
    }
  }

  // Espera pelo input no DOM; se expirar, procura no HTML estatico
  private async lerToken(pagina: PaginaRender): Promise<string | null> {
    try {
      const campo = pagina.locator(`input[name="${NOME_CAMPO_TOKEN}"]`).first();
      await campo.waitFor({ state: 'attached', timeout: 20000 });
      const valor = await campo.getAttribute('value');
      if (valor) return valor;
    } catch (error) {
      console.warn(`[Render] Token nao encontrado no DOM, tentando o HTML da pagina: ${mensagemErro(error)}`);
    }

    return extrairTokenDoHtml(await pagina.content(), NOME_CAMPO_TOKEN);
  }
}
