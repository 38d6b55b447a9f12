// Fleet Duel - Board
//
// One player's 10x10 grid: the ships they placed during setup and the log of
// shots fired at them. Ships are only registered through `placeShip` and only
// mutated through `receiveShot`.

import { GameRuleError } from './errors.js';
import { allCoordinates, formatCoordinate, perimeter, span } from './coordinates.js';
import {
  RosterCount,
  isRosterComplete,
  remainingRoster,
  validatePlacement,
} from './placement.js';
import {
  CellIndex,
  CellOutcome,
  CellView,
  Coordinate,
  GRID_SIZE,
  PlayerSide,
  ShipSize,
  ShipSnapshot,
  ShotOutcome,
  ShotResolution,
  Visibility,
  cellToCoordinate,
  coordinateToCell,
  isValidCoordinate,
} from './types.js';

// =============================================================================
// Ship
// =============================================================================

class Ship {
  private readonly hitCells = new Set<CellIndex>();
  private readonly cellSet: ReadonlySet<CellIndex>;

  constructor(
    readonly id: string,
    readonly size: ShipSize,
    readonly cells: readonly Coordinate[]
  ) {
    this.cellSet = new Set(cells.map(coordinateToCell));
  }

  registerHit(cell: CellIndex): void {
    this.hitCells.add(cell);
  }

  get isSunk(): boolean {
    return this.hitCells.size === this.cellSet.size;
  }

  snapshot(): ShipSnapshot {
    return {
      id: this.id,
      size: this.size,
      cells: [...this.cells],
      hits: this.cells.filter(c => this.hitCells.has(coordinateToCell(c))),
      isSunk: this.isSunk,
    };
  }
}

// =============================================================================
// Board
// =============================================================================

export interface ShotLogEntry {
  readonly target: Coordinate;
  readonly outcome: ShotOutcome;
}

export class Board {
  readonly owner: PlayerSide;
  private readonly ships: Ship[] = [];
  private readonly shipByCell = new Map<CellIndex, Ship>();
  private readonly shotLog = new Map<CellIndex, ShotOutcome>();

  constructor(owner: PlayerSide) {
    this.owner = owner;
  }

  // ===========================================================================
  // Setup
  // ===========================================================================

  /**
   * Validates and registers a ship spanning start..end.
   * On any rejection the board is unchanged.
   */
  placeShip(start: Coordinate, end: Coordinate): ShipSnapshot {
    for (const endpoint of [start, end]) {
      if (!isValidCoordinate(endpoint)) {
        throw new GameRuleError(
          'INVALID_COORDINATE',
          `Invalid position: row=${endpoint.row}, col=${endpoint.col}`
        );
      }
    }

    const cells = span(start, end);
    const placement = validatePlacement(cells, this.ships);

    const ship = new Ship(`ship-${this.ships.length + 1}`, placement.size, placement.cells);
    this.ships.push(ship);
    for (const cell of placement.cells) {
      this.shipByCell.set(coordinateToCell(cell), ship);
    }

    return ship.snapshot();
  }

  remainingRoster(): RosterCount {
    return remainingRoster(this.ships);
  }

  isFleetComplete(): boolean {
    return isRosterComplete(this.ships);
  }

  getShips(): ShipSnapshot[] {
    return this.ships.map(ship => ship.snapshot());
  }

  // ===========================================================================
  // Shots
  // ===========================================================================

  outcomeAt(target: Coordinate): CellOutcome {
    return this.shotLog.get(coordinateToCell(target)) ?? 'unfired';
  }

  /**
   * Fires at a cell. A hit that sinks a ship also marks every still-unfired
   * perimeter cell of that ship as `auto_miss` before returning.
   *
   * @throws GameRuleError ALREADY_FIRED if the cell already has an outcome,
   * INVALID_COORDINATE if it is off the board
   */
  receiveShot(target: Coordinate): ShotResolution {
    if (!isValidCoordinate(target)) {
      throw new GameRuleError(
        'INVALID_COORDINATE',
        `Invalid position: row=${target.row}, col=${target.col}`
      );
    }

    const cell = coordinateToCell(target);
    const previous = this.shotLog.get(cell);
    if (previous !== undefined) {
      throw new GameRuleError(
        'ALREADY_FIRED',
        `Cell ${formatCoordinate(target)} already shot (${previous})`
      );
    }

    const ship = this.shipByCell.get(cell);
    if (!ship) {
      this.shotLog.set(cell, 'miss');
      return { target, outcome: 'miss', sunkShip: null, autoMissed: [] };
    }

    ship.registerHit(cell);
    this.shotLog.set(cell, 'hit');

    if (!ship.isSunk) {
      return { target, outcome: 'hit', sunkShip: null, autoMissed: [] };
    }

    const autoMissed: Coordinate[] = [];
    for (const neighbor of perimeter(ship.cells)) {
      const index = coordinateToCell(neighbor);
      if (!this.shotLog.has(index)) {
        this.shotLog.set(index, 'auto_miss');
        autoMissed.push(neighbor);
      }
    }

    return { target, outcome: 'hit', sunkShip: ship.snapshot(), autoMissed };
  }

  unfiredCoordinates(): Coordinate[] {
    return allCoordinates().filter(c => !this.shotLog.has(coordinateToCell(c)));
  }

  getShotLog(): ShotLogEntry[] {
    return [...this.shotLog.entries()]
      .sort(([a], [b]) => a - b)
      .map(([cell, outcome]) => ({ target: cellToCoordinate(cell), outcome }));
  }

  allShipsSunk(): boolean {
    return this.ships.every(ship => ship.isSunk);
  }

  floatingShipCount(): number {
    return this.ships.filter(ship => !ship.isSunk).length;
  }

  // ===========================================================================
  // Views
  // ===========================================================================

  /**
   * Derived cell states, rows A-J. The owner sees their intact ships; the
   * opponent only sees what their shots revealed.
   */
  view(visibility: Visibility): CellView[][] {
    const rows: CellView[][] = [];

    for (let row = 0; row < GRID_SIZE; row++) {
      const line: CellView[] = [];
      for (let col = 0; col < GRID_SIZE; col++) {
        const cell = coordinateToCell({ row, col });
        const outcome = this.shotLog.get(cell);

        if (outcome !== undefined) {
          line.push(outcome);
        } else if (visibility === 'owner') {
          line.push(this.shipByCell.has(cell) ? 'ship' : 'water');
        } else {
          line.push('unknown');
        }
      }
      rows.push(line);
    }

    return rows;
  }
}
