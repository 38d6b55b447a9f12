// Fleet Duel - Coordinate System
//
// Board addresses are written as a row letter (A-J) followed by a column
// number (1-10): A1 is the top-left corner, J10 the bottom-right.

import { GameRuleError } from './errors.js';
import {
  Coordinate,
  GRID_SIZE,
  ROW_LABELS,
  isValidCoordinate,
  coordinateToCell,
  cellToCoordinate,
  CellIndex,
} from './types.js';

const TOKEN_PATTERN = /^([A-Z])(\d+)$/;

// =============================================================================
// Parsing & Formatting
// =============================================================================

/**
 * Parses a token such as `a5` or `J10` into a coordinate.
 * @throws GameRuleError INVALID_COORDINATE for malformed or out-of-range tokens
 */
export function parseCoordinate(token: string): Coordinate {
  const normalized = token.trim().toUpperCase();
  const match = TOKEN_PATTERN.exec(normalized);

  if (!match) {
    throw new GameRuleError(
      'INVALID_COORDINATE',
      `Invalid coordinate format: "${token}". Use a letter A-J followed by 1-${GRID_SIZE}`
    );
  }

  const [, letter, digits] = match;
  const row = ROW_LABELS.indexOf(letter);
  if (row === -1) {
    throw new GameRuleError('INVALID_COORDINATE', `Row must be A-J, got ${letter}`);
  }

  const number = parseInt(digits, 10);
  if (number < 1 || number > GRID_SIZE) {
    throw new GameRuleError(
      'INVALID_COORDINATE',
      `Column must be 1-${GRID_SIZE}, got ${number}`
    );
  }

  return { row, col: number - 1 };
}

export function formatCoordinate(coord: Coordinate): string {
  return `${ROW_LABELS[coord.row]}${coord.col + 1}`;
}

/**
 * @throws GameRuleError INVALID_COORDINATE when the position is off the board
 */
export function createCoordinate(row: number, col: number): Coordinate {
  const coord = { row, col };
  if (!isValidCoordinate(coord)) {
    throw new GameRuleError(
      'INVALID_COORDINATE',
      `Invalid position: row=${row}, col=${col}. Must be between 0 and ${GRID_SIZE - 1}`
    );
  }
  return coord;
}

// =============================================================================
// Geometry
// =============================================================================

/**
 * Returns every coordinate from start to end inclusive, ordered along the
 * varying axis. Equal endpoints give a single cell.
 * @throws GameRuleError NOT_COLLINEAR when the endpoints share neither row nor column
 */
export function span(start: Coordinate, end: Coordinate): Coordinate[] {
  const cells: Coordinate[] = [];

  if (start.row === end.row) {
    const from = Math.min(start.col, end.col);
    const to = Math.max(start.col, end.col);
    for (let col = from; col <= to; col++) {
      cells.push({ row: start.row, col });
    }
  } else if (start.col === end.col) {
    const from = Math.min(start.row, end.row);
    const to = Math.max(start.row, end.row);
    for (let row = from; row <= to; row++) {
      cells.push({ row, col: start.col });
    }
  } else {
    throw new GameRuleError(
      'NOT_COLLINEAR',
      `Ship must be horizontal or vertical: ${formatCoordinate(start)} to ${formatCoordinate(end)}`
    );
  }

  return cells;
}

/**
 * The up-to-8 orthogonal and diagonal neighbours of a cell, clipped to the board.
 */
export function neighbors8(coord: Coordinate): Coordinate[] {
  const result: Coordinate[] = [];

  for (let dr = -1; dr <= 1; dr++) {
    for (let dc = -1; dc <= 1; dc++) {
      if (dr === 0 && dc === 0) continue;
      const neighbor = { row: coord.row + dr, col: coord.col + dc };
      if (isValidCoordinate(neighbor)) {
        result.push(neighbor);
      }
    }
  }

  return result;
}

/**
 * Union of `neighbors8` over a group of cells, excluding the cells themselves.
 * Returned in row-major order.
 */
export function perimeter(cells: readonly Coordinate[]): Coordinate[] {
  const own = new Set(cells.map(coordinateToCell));
  const ring = new Set<CellIndex>();

  for (const cell of cells) {
    for (const neighbor of neighbors8(cell)) {
      const index = coordinateToCell(neighbor);
      if (!own.has(index)) {
        ring.add(index);
      }
    }
  }

  return [...ring].sort((a, b) => a - b).map(cellToCoordinate);
}

/**
 * All 100 board coordinates in row-major order.
 */
export function allCoordinates(): Coordinate[] {
  const result: Coordinate[] = [];
  for (let row = 0; row < GRID_SIZE; row++) {
    for (let col = 0; col < GRID_SIZE; col++) {
      result.push({ row, col });
    }
  }
  return result;
}
