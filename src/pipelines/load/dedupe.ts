import { InsertRow, InsertValue } from './record-normalizer';

export function keyOf(row: InsertRow, upsertKey: string[]): string {
  return JSON.stringify(upsertKey.map((column) => row[column] ?? null));
}

function versionOf(value: InsertValue | undefined): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'string') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : Date.parse(value.replace(' ', 'T') + 'Z');
  }
  return Number.NEGATIVE_INFINITY;
}

/**
 * Keeps one row per key: the highest version, or the later row on a tie.
 * Rows stay in the order their key first appeared.
 */
export function collapseByKey(
  rows: InsertRow[],
  upsertKey: string[],
  versionColumn: string,
): InsertRow[] {
  const winners = new Map<string, InsertRow>();

  for (const row of rows) {
    const key = keyOf(row, upsertKey);
    const current = winners.get(key);
    if (!current || versionOf(row[versionColumn]) >= versionOf(current[versionColumn])) {
      winners.set(key, row);
    }
  }

  return [...winners.values()];
}

export function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}
