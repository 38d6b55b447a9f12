import { Board } from '../src/board.js';
import { parseCoordinate, formatCoordinate } from '../src/coordinates.js';
import { GameRuleError } from '../src/errors.js';
import type { RandomSource } from '../src/random.js';
import type { Coordinate, PlayerSide } from '../src/types.js';

// =============================================================================
// Shared Fixtures
// =============================================================================

/**
 * A complete, valid fleet laid out on rows A, C, E and G.
 */
export const FIXED_FLEET: readonly (readonly [string, string])[] = [
  ['A1', 'A4'],
  ['A6', 'A8'],
  ['C1', 'C3'],
  ['C5', 'C6'],
  ['C8', 'C9'],
  ['E1', 'E2'],
  ['E4', 'E4'],
  ['E6', 'E6'],
  ['E8', 'E8'],
  ['G1', 'G1'],
];

export function buildFixedBoard(owner: PlayerSide): Board {
  const board = new Board(owner);
  for (const [start, end] of FIXED_FLEET) {
    board.placeShip(parseCoordinate(start), parseCoordinate(end));
  }
  return board;
}

/** Every ship cell of FIXED_FLEET in placement order */
export function fixedFleetCells(): Coordinate[] {
  return buildFixedBoard('bot')
    .getShips()
    .flatMap(ship => ship.cells);
}

/**
 * Always answers 0, so the bot targets the first unfired cell in row-major order.
 */
export const firstChoice: RandomSource = {
  nextInt: () => 0,
};

export function seedOf(byte: number): Uint8Array {
  return new Uint8Array(32).fill(byte);
}

export function labels(coords: readonly Coordinate[]): string[] {
  return coords.map(formatCoordinate);
}

export function at(token: string): Coordinate {
  return parseCoordinate(token);
}

/**
 * Runs fn and returns the GameRuleError it throws.
 */
export function errorOf(fn: () => unknown): GameRuleError {
  try {
    fn();
  } catch (error) {
    if (error instanceof GameRuleError) return error;
    throw error;
  }
  throw new Error('Expected a GameRuleError');
}
