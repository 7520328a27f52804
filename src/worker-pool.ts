/**
 * Bounded worker pool.
 *
 * Runs at most `concurrency` tasks at once and waits for every task to settle.
 * Each outcome lands in the slot matching its input position, so a failing
 * task never disturbs the results of the others.
 */

export type Settled<R> =
  | { ok: true; value: R }
  | { ok: false; error: unknown };

export async function runPool<T, R>(
  inputs: readonly T[],
  concurrency: number,
  worker: (input: T, position: number) => Promise<R>
): Promise<Settled<R>[]> {
  const results = new Array<Settled<R>>(inputs.length);
  let next = 0;

  const lane = async (): Promise<void> => {
    while (next < inputs.length) {
      const position = next++;
      try {
        results[position] = { ok: true, value: await worker(inputs[position], position) };
      } catch (error) {
        results[position] = { ok: false, error };
      }
    }
  };

  const lanes = Math.max(1, Math.min(Math.floor(concurrency), inputs.length));
  await Promise.all(Array.from({ length: lanes }, () => lane()));
  return results;
}
