/**
 * Page Layout Reconstruction
 *
 * Groups positioned text items into lines by Y position (top to bottom,
 * left to right within a line) and detects tables as runs of consecutive
 * lines that split into the same number of gap-separated cells.
 */

export interface PositionedText {
  str: string;
  x: number;
  y: number;
  width: number;
}

export interface PageLayout {
  text: string;
  tables: string[][][];
}

/** Horizontal gap (PDF units) that separates two table cells */
export const CELL_GAP = 15;
export const MIN_TABLE_ROWS = 2;
export const MIN_TABLE_COLUMNS = 2;

export function groupLines(items: readonly PositionedText[]): PositionedText[][] {
  // Text on the same visual line may have slight Y variations
  const itemsByY = new Map<number, PositionedText[]>();

  for (const item of items) {
    if (item.str.trim() === '') continue;
    const y = Math.round(item.y);
    const line = itemsByY.get(y);
    if (line) {
      line.push(item);
    } else {
      itemsByY.set(y, [item]);
    }
  }

  return [...itemsByY.entries()]
    .sort(([a], [b]) => b - a)
    .map(([, line]) => [...line].sort((a, b) => a.x - b.x));
}

export function splitCells(line: readonly PositionedText[]): string[] {
  const cells: string[] = [];
  let current: string[] = [];
  let previousEnd: number | undefined;

  for (const item of line) {
    if (previousEnd !== undefined && item.x - previousEnd > CELL_GAP && current.length > 0) {
      cells.push(current.join(' ').trim());
      current = [];
    }
    current.push(item.str);
    previousEnd = item.x + item.width;
  }
  if (current.length > 0) {
    cells.push(current.join(' ').trim());
  }

  return cells.filter((cell) => cell.length > 0);
}

export function detectTables(rows: readonly string[][]): string[][][] {
  const tables: string[][][] = [];
  let run: string[][] = [];

  const flush = () => {
    if (run.length >= MIN_TABLE_ROWS) tables.push(run);
    run = [];
  };

  for (const cells of rows) {
    if (cells.length < MIN_TABLE_COLUMNS) {
      flush();
    } else if (run.length > 0 && run[0].length !== cells.length) {
      flush();
      run.push(cells);
    } else {
      run.push(cells);
    }
  }
  flush();

  return tables;
}

export function layoutPage(items: readonly PositionedText[]): PageLayout {
  const lines = groupLines(items);
  const text = lines
    .map((line) => line.map((item) => item.str).join(' ').trim())
    .filter((line) => line.length > 0)
    .join('\n');

  return { text, tables: detectTables(lines.map(splitCells)) };
}
