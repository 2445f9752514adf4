/**
 * Work item grouping utilities - pure functions.
 * Used by the orchestrator to fan out one task per region.
 */

import type { WorkItem } from "../../types/index.js";

/**
 * Partition items by groupKey, preserving first-seen group order and the
 * order of items inside each group.
 *
 * @example
 * groupByKey([{ id: "1", groupKey: "north" }, { id: "2", groupKey: "south" }, { id: "3", groupKey: "north" }])
 * // Map { "north" => [1, 3], "south" => [2] }
 */
export function groupByKey<T extends Pick<WorkItem, "groupKey">>(items: readonly T[]): Map<string, T[]> {
  const groups = new Map<string, T[]>();

  for (const item of items) {
    const group = groups.get(item.groupKey);
    if (group) {
      group.push(item);
    } else {
      groups.set(item.groupKey, [item]);
    }
  }

  return groups;
}

/**
 * Run fn over items with at most `concurrency` in flight, keeping input order
 * in the returned settled results. One rejection never stops the others.
 */
export async function mapSettledWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<PromiseSettledResult<R>[]> {
  const results: PromiseSettledResult<R>[] = new Array(items.length);
  const width = Math.max(1, Math.min(concurrency, items.length));
  let next = 0;

  const lane = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      try {
        results[index] = { status: "fulfilled", value: await fn(items[index], index) };
      } catch (reason) {
        results[index] = { status: "rejected", reason };
      }
    }
  };

  await Promise.all(Array.from({ length: width }, () => lane()));
  return results;
}
