export async function processWithConcurrency<T>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<void>,
): Promise<void> {
  let index = 0;
  const slots = new Array(Math.max(1, concurrency)).fill(null).map(async () => {
    while (true) {
      const current = index;
      index += 1;
      if (current >= items.length) {
        break;
      }
      await worker(items[current], current);
    }
  });
  await Promise.all(slots);
}
