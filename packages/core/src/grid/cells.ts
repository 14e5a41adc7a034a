export type Cell = Readonly<{
  row: number;
  col: number;
}>;

export type EndpointPair = readonly [Cell, Cell];

export function cell(row: number, col: number): Cell {
  return Object.freeze({ row, col });
}

/** Row-major list of every cell in an n×n grid. */
export function allCells(n: number): Cell[] {
  const out: Cell[] = [];
  for (let row = 0; row < n; row++) {
    for (let col = 0; col < n; col++) {
      out.push(cell(row, col));
    }
  }
  return out;
}

export function cellKey(c: Cell): string {
  return `${String(c.row)}:${String(c.col)}`;
}

export function sameCell(a: Cell, b: Cell): boolean {
  return a.row === b.row && a.col === b.col;
}

export function manhattan(a: Cell, b: Cell): number {
  return Math.abs(a.row - b.row) + Math.abs(a.col - b.col);
}

export function flattenPairs(pairs: readonly EndpointPair[]): Cell[] {
  const out: Cell[] = [];
  for (const [a, b] of pairs) {
    out.push(a, b);
  }
  return out;
}
