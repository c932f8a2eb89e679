import { describe, it, expect } from 'vitest';
import { extrairDadosModal, extrairTokenDoHtml } from './modal.js';

const MODAL_HTML = `
<div class="modal-content">
  <div class="modal-header">
    <h4 class="modal-title"><b>Silva e Souza Sociedade de Advogados</b></h4>
  </div>
  <div class="modal-body">
    <span class="label label-success">Ativa</span>
    <p><b>Inscrição:</b> 4321</p>
    <p><b>Estado:</b> SP</p>
    <p><b>Endereço:</b>
      Rua das Flores, 100 - Centro
    </p>
    <p><b>Telefones:</b> (11) 3333-4444</p>
    <table class="socContainer">
      <tr><th>Nº</th><th>Nome</th><th>Nome social</th><th>Tipo</th></tr>
      <tr data-cnalink="/Home/Detail/111">
        <td>111</td><td>Ana Silva</td><td></td><td>Sócio</td>
      </tr>
      <tr data-cnalink="/Home/Detail/222">
        <td>222</td><td>Bruno Souza</td><td>Bia Souza</td><td>Sócio de serviço</td>
      </tr>
    </table>
  </div>
</div>`;

describe('extrairDadosModal', () => {
  it('extrai os campos do modal', () => {
    const dados = extrairDadosModal(MODAL_HTML);

    expect(dados.firm_name).toBe('Silva e Souza Sociedade de Advogados');
    expect(dados.inscricao).toBe('4321');
    expect(dados.estado).toBe('SP');
    expect(dados.situacao).toBe('Ativa');
    expect(dados.endereco).toBe('Rua das Flores, 100 - Centro');
    expect(dados.telefones).toBe('(11) 3333-4444');
  });

  it('extrai as linhas da tabela de socios ignorando o cabecalho', () => {
    const dados = extrairDadosModal(MODAL_HTML);

    expect(dados.socios).toHaveLength(2);
    expect(dados.socios[0]).toEqual({
      numero: '111',
      nome: 'Ana Silva',
      nome_social: '',
      tipo: 'Sócio',
      cna_link: '/Home/Detail/111',
    });
    expect(dados.socios[1].nome_social).toBe('Bia Souza');
  });

  it('usa string vazia quando a linha nao tem data-cnalink', () => {
    const dados = extrairDadosModal(
      '<table class="socContainer"><tr><td>1</td><td>Carla</td><td></td><td>Sócia</td></tr></table>'
    );
    expect(dados.socios[0].cna_link).toBe('');
  });

  it('retorna null para campos ausentes sem lancar erro', () => {
    const dados = extrairDadosModal('<div class="modal-content"><p>Sem dados</p></div>');

    expect(dados).toEqual({
      firm_name: null,
      inscricao: null,
      estado: null,
      situacao: null,
      endereco: null,
      telefones: null,
      socios: [],
    });
  });

  it('aceita HTML vazio', () => {
    expect(extrairDadosModal('').firm_name).toBeNull();
  });
});

describe('extrairTokenDoHtml', () => {
  it('le o valor do input oculto', () => {
    const html = '<form><input type="hidden" name="__RequestVerificationToken" value="token-de-teste" /></form>';
    expect(extrairTokenDoHtml(html)).toBe('token-de-teste');
  });

  it('retorna null quando o campo nao existe', () => {
    expect(extrairTokenDoHtml('<form></form>')).toBeNull();
  });
});
