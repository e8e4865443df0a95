/**
 * @fileoverview Terminal output helpers shared by the CLI commands
 */

export type DisplayValue = string | number | boolean | null;

/**
 * Print a key-value list
 */
export function printKeyValue(items: Array<{ key: string; value: DisplayValue }>): void {
  const maxKeyLength = Math.max(...items.map((item) => item.key.length));

  for (const item of items) {
    const value = item.value === null ? 'N/A' : String(item.value);
    console.log(`  ${item.key.padEnd(maxKeyLength)}: ${value}`);
  }
}

/**
 * Display a simple table in the terminal
 */
export function printTable(headers: string[], rows: string[][]): void {
  const widths = headers.map((header, i) => {
    const maxRowWidth = Math.max(0, ...rows.map((row) => (row[i] ?? '').length));
    return Math.max(header.length, maxRowWidth);
  });

  console.log(headers.map((header, i) => header.padEnd(widths[i] ?? 0)).join(' | '));
  console.log(widths.map((width) => '-'.repeat(width)).join('-+-'));
  for (const row of rows) {
    console.log(row.map((cell, i) => cell.padEnd(widths[i] ?? 0)).join(' | '));
  }
}

export function formatPercent(value: number): string {
  return `${Math.round(value * 100)}%`;
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}
