// Fleet Duel - Core Types

// =============================================================================
// Game Constants
// =============================================================================

export const GRID_SIZE = 10;
export const TOTAL_CELLS = 100;
export const FLEET_ROSTER: readonly ShipSize[] = [4, 3, 3, 2, 2, 2, 1, 1, 1, 1] as const;
export const TOTAL_SHIP_CELLS = 20;
export const ROW_LABELS = 'ABCDEFGHIJ';

// =============================================================================
// Core Types
// =============================================================================

/** Cell index from 0-99 representing a position on the 10x10 grid */
export type CellIndex = number & { readonly __brand: unique symbol };

/** Board address: row 0-9 (A-J), col 0-9 (1-10) */
export interface Coordinate {
  readonly row: number;
  readonly col: number;
}

/** Ship sizes: 4 = battleship, 3 = cruiser, 2 = destroyer, 1 = boat */
export type ShipSize = 1 | 2 | 3 | 4;

export type Orientation = 'horizontal' | 'vertical';

/** Who owns a board, or who fired a shot */
export type PlayerSide = 'player' | 'bot';

/** Recorded outcome of a shot-log cell; absence from the log means unfired */
export type ShotOutcome = 'miss' | 'hit' | 'auto_miss';

export type CellOutcome = ShotOutcome | 'unfired';

/** Read-only snapshot of a ship */
export interface ShipSnapshot {
  readonly id: string;
  readonly size: ShipSize;
  readonly cells: readonly Coordinate[];
  readonly hits: readonly Coordinate[];
  readonly isSunk: boolean;
}

/** Result of resolving one shot against a board */
export interface ShotResolution {
  readonly target: Coordinate;
  readonly outcome: 'hit' | 'miss';
  readonly sunkShip: ShipSnapshot | null;
  readonly autoMissed: readonly Coordinate[];
}

/** One entry of the game's chronological shot history */
export interface ShotRecord {
  readonly turn: number;
  readonly shooter: PlayerSide;
  readonly target: Coordinate;
  readonly outcome: 'hit' | 'miss';
  readonly sunkShipId: string | null;
  readonly autoMissed: readonly Coordinate[];
}

/** A full round: the player's shot, then the bot's reply unless the player won */
export interface RoundResult {
  readonly turn: number;
  readonly player: ShotRecord;
  readonly bot: ShotRecord | null;
}

export type EnginePhase =
  | { readonly kind: 'awaiting_player_shot' }
  | { readonly kind: 'awaiting_bot_shot' }
  | { readonly kind: 'game_over'; readonly winner: PlayerSide };

/** What a viewer sees in one cell */
export type CellView = 'unknown' | 'water' | 'ship' | 'hit' | 'miss' | 'auto_miss';

/** Whose eyes a board is rendered for */
export type Visibility = 'owner' | 'opponent';

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * Creates a branded CellIndex from a number
 * @throws Error if cell is out of range
 */
export function createCellIndex(cell: number): CellIndex {
  if (!isValidCell(cell)) {
    throw new Error(`Invalid cell index: ${cell}. Must be between 0 and ${TOTAL_CELLS - 1}`);
  }
  return cell;
}

/**
 * Converts a cell index (0-99) to a coordinate
 */
export function cellToCoordinate(cell: CellIndex): Coordinate {
  return {
    row: Math.floor(cell / GRID_SIZE),
    col: cell % GRID_SIZE,
  };
}

/**
 * Converts an in-bounds coordinate to its cell index.
 * Coordinates only come from the coordinate module, which validates bounds.
 */
export function coordinateToCell(coord: Coordinate): CellIndex {
  return createCellIndex(coord.row * GRID_SIZE + coord.col);
}

export function isValidCell(cell: number): cell is CellIndex {
  return Number.isInteger(cell) && cell >= 0 && cell < TOTAL_CELLS;
}

/**
 * Checks if a coordinate is within bounds
 */
export function isValidCoordinate(coord: Coordinate): boolean {
  return (
    Number.isInteger(coord.row) &&
    Number.isInteger(coord.col) &&
    coord.row >= 0 &&
    coord.row < GRID_SIZE &&
    coord.col >= 0 &&
    coord.col < GRID_SIZE
  );
}

export function isShipSize(size: number): size is ShipSize {
  return size === 1 || size === 2 || size === 3 || size === 4;
}
