export const runWithConcurrency = async <T>(
  tasks: Array<() => Promise<T>>,
  concurrency: number,
): Promise<T[]> => {
  const results: T[] = [];
  let index = 0;

  const workers = new Array(Math.max(1, Math.min(concurrency, tasks.length))).fill(null).map(async () => {
    while (index < tasks.length) {
      const current = index;
      index += 1;
      const task = tasks[current];
      if (!task) {
        break;
      }
      results[current] = await task();
    }
  });

  await Promise.all(workers);
  return results;
};
