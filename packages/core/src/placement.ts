// Fleet Duel - Placement Validator
//
// A candidate ship is accepted only when its size still has quota in the
// roster, none of its cells is occupied, and none of its cells touches another
// ship, diagonals included. Candidates arrive as the output of `span`, so they
// are always straight and contiguous.

import { GameRuleError } from './errors.js';
import { formatCoordinate, neighbors8 } from './coordinates.js';
import {
  CellIndex,
  Coordinate,
  FLEET_ROSTER,
  ShipSize,
  coordinateToCell,
  isShipSize,
} from './types.js';

// =============================================================================
// Types
// =============================================================================

/** Anything already on the board that a candidate is checked against */
export interface PlacedShip {
  readonly size: ShipSize;
  readonly cells: readonly Coordinate[];
}

export interface ValidatedPlacement {
  readonly size: ShipSize;
  readonly cells: readonly Coordinate[];
}

/** Ships still needed per size, e.g. `{ 1: 4, 2: 3, 3: 2, 4: 1 }` for an empty board */
export type RosterCount = Record<ShipSize, number>;

// =============================================================================
// Roster
// =============================================================================

export function rosterQuota(): RosterCount {
  const quota: RosterCount = { 1: 0, 2: 0, 3: 0, 4: 0 };
  for (const size of FLEET_ROSTER) {
    quota[size]++;
  }
  return quota;
}

export function remainingRoster(placed: readonly PlacedShip[]): RosterCount {
  const remaining = rosterQuota();
  for (const ship of placed) {
    remaining[ship.size]--;
  }
  return remaining;
}

export function isRosterComplete(placed: readonly PlacedShip[]): boolean {
  const remaining = remainingRoster(placed);
  return remaining[1] === 0 && remaining[2] === 0 && remaining[3] === 0 && remaining[4] === 0;
}

/** Sizes that still have quota, largest first */
export function neededSizes(placed: readonly PlacedShip[]): ShipSize[] {
  const remaining = remainingRoster(placed);
  const sizes: ShipSize[] = [4, 3, 2, 1];
  return sizes.filter(size => remaining[size] > 0);
}

// =============================================================================
// Validation
// =============================================================================

/**
 * Checks a candidate against the ships already placed on the same board.
 * Pure: nothing is registered here, the board does that on success.
 *
 * @throws GameRuleError INVALID_SHIP_SIZE, ROSTER_EXHAUSTED, OVERLAP or ADJACENT_SHIPS
 */
export function validatePlacement(
  cells: readonly Coordinate[],
  placed: readonly PlacedShip[]
): ValidatedPlacement {
  const size = cells.length;
  if (!isShipSize(size)) {
    throw new GameRuleError(
      'INVALID_SHIP_SIZE',
      `Invalid ship size: ${size}. Allowed: 1, 2, 3, 4`
    );
  }

  const remaining = remainingRoster(placed);
  if (remaining[size] <= 0) {
    const quota = rosterQuota()[size];
    throw new GameRuleError(
      'ROSTER_EXHAUSTED',
      `Fleet already has ${quota} ship(s) of size ${size}`
    );
  }

  const occupied = new Set<CellIndex>();
  for (const ship of placed) {
    for (const cell of ship.cells) {
      occupied.add(coordinateToCell(cell));
    }
  }

  for (const cell of cells) {
    if (occupied.has(coordinateToCell(cell))) {
      throw new GameRuleError(
        'OVERLAP',
        `${formatCoordinate(cell)} is already occupied by another ship`
      );
    }
  }

  for (const cell of cells) {
    const touching = neighbors8(cell).find(n => occupied.has(coordinateToCell(n)));
    if (touching) {
      throw new GameRuleError(
        'ADJACENT_SHIPS',
        `${formatCoordinate(cell)} touches the ship at ${formatCoordinate(touching)}`
      );
    }
  }

  return { size, cells: [...cells] };
}
