/**
 * Выполняет worker для каждого элемента, не больше limit одновременно.
 * Результаты в порядке входных элементов.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results: R[] = [];
  // Общий итератор: каждый воркер забирает следующий свободный элемент.
  const iterator = items.entries();

  const run = async (): Promise<void> => {
    for (const [index, item] of iterator) {
      results[index] = await worker(item, index);
    }
  };

  const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, () => run());
  await Promise.all(workers);
  return results;
}
