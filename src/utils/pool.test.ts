import { describe, it, expect } from 'vitest';
import { executarComLimite } from './pool.js';

describe('executarComLimite', () => {
  it('mantem a ordem de entrada independente da ordem de conclusao', async () => {
    const atrasos = [30, 5, 15, 1];

    const resultados = await executarComLimite(atrasos, 2, async (atraso, indice) => {
      await new Promise((r) => setTimeout(r, atraso));
      return `tarefa-${indice}`;
    });

    expect(resultados).toEqual([
      { status: 'fulfilled', value: 'tarefa-0' },
      { status: 'fulfilled', value: 'tarefa-1' },
      { status: 'fulfilled', value: 'tarefa-2' },
      { status: 'fulfilled', value: 'tarefa-3' },
    ]);
  });

  it('nunca excede o limite de tarefas simultaneas', async () => {
    let ativas = 0;
    let pico = 0;

    await executarComLimite([1, 2, 3, 4, 5, 6], 2, async () => {
      ativas++;
      pico = Math.max(pico, ativas);
      await new Promise((r) => setTimeout(r, 5));
      ativas--;
    });

    expect(pico).toBe(2);
  });

  it('registra falhas individuais sem interromper as demais', async () => {
    const erro = new Error('falhou');

    const resultados = await executarComLimite(['a', 'b', 'c'], 2, async (item) => {
      if (item === 'b') throw erro;
      return item.toUpperCase();
    });

    expect(resultados[0]).toEqual({ status: 'fulfilled', value: 'A' });
    expect(resultados[1]).toEqual({ status: 'rejected', reason: erro });
    expect(resultados[2]).toEqual({ status: 'fulfilled', value: 'C' });
  });

  it('retorna lista vazia sem itens', async () => {
    expect(await executarComLimite([], 2, async () => 1)).toEqual([]);
  });
});
