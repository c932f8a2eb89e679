export type ResultadoTarefa<R> =
  | { status: 'fulfilled'; value: R }
  | { status: 'rejected'; reason: unknown };

/**
 * Executa as tarefas com no maximo `limite` simultaneas.
 * Todas sao aguardadas (falhas nao interrompem as demais) e o resultado segue a ordem de entrada.
 */
export async function executarComLimite<T, R>(
  itens: readonly T[],
  limite: number,
  tarefa: (item: T, indice: number) => Promise<R>
): Promise<ResultadoTarefa<R>[]> {
  const resultados: ResultadoTarefa<R>[] = new Array(itens.length);
  let proximo = 0;

  const worker = async (): Promise<void> => {
    while (proximo < itens.length) {
      const indice = proximo++;
      try {
        resultados[indice] = { status: 'fulfilled', value: await tarefa(itens[indice], indice) };
      } catch (reason) {
        resultados[indice] = { status: 'rejected', reason };
      }
    }
  };

  const totalWorkers = Math.max(1, Math.min(limite, itens.length));
  await Promise.all(Array.from({ length: totalWorkers }, () => worker()));

  return resultados;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
