// Fleet Duel - Board Renderer
//
// Plain-text grids for terminals and logs:
//
//       1  2  3  4  5  6  7  8  9 10
//   A   X  O  .  .  .  .  .  .  .  .
//   B   O  O  .  .  #  #  .  .  .  .

import { GRID_SIZE, ROW_LABELS, type CellView } from '@fleet-duel/core';

// =============================================================================
// Symbols
// =============================================================================

export const CELL_SYMBOLS: Readonly<Record<CellView, string>> = {
  unknown: '.',
  water: '.',
  ship: '#',
  hit: 'X',
  miss: 'O',
  auto_miss: 'O',
};

const CELL_WIDTH = 3;

// =============================================================================
// Rendering
// =============================================================================

export function renderBoard(cells: readonly (readonly CellView[])[]): string {
  const header = '  ' + Array.from({ length: GRID_SIZE }, (_, col) =>
    String(col + 1).padStart(CELL_WIDTH)
  ).join('');

  const rows = cells.map((row, index) =>
    ROW_LABELS[index] + ' ' + row.map(cell => CELL_SYMBOLS[cell].padStart(CELL_WIDTH)).join('')
  );

  return [header, ...rows].join('\n') + '\n';
}
