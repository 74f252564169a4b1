// sqlite caps bound parameters per statement
export const SQL_BATCH_SIZE = 500;

export function chunk<T>(items: readonly T[], size: number = SQL_BATCH_SIZE): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}
