// Fleet Duel - Fleet Builder
//
// Two ways to fill a board with the full roster:
// - FleetBuilder: the human declares ships one at a time; every attempt is
//   answered with accept or reject-with-reason and nothing is retried here.
// - generateBotFleet: random generate-and-test over sizes, orientations and
//   anchors, using the same validator as the human path.

import { GameRuleError, isGameRuleError, GameErrorCode } from './errors.js';
import { parseCoordinate } from './coordinates.js';
import { Board } from './board.js';
import { RandomSource, createRandom, pickOne } from './random.js';
import { RosterCount, neededSizes } from './placement.js';
import {
  CellView,
  Coordinate,
  GRID_SIZE,
  Orientation,
  PlayerSide,
  ShipSize,
  ShipSnapshot,
} from './types.js';

// =============================================================================
// Types
// =============================================================================

export type PlacementAttempt =
  | { readonly accepted: true; readonly ship: ShipSnapshot; readonly remaining: RosterCount }
  | { readonly accepted: false; readonly code: GameErrorCode; readonly message: string };

export interface BotFleetOptions {
  readonly random?: RandomSource;
  /** Consecutive rejections before the layout is thrown away and restarted */
  readonly maxAttemptsPerShip?: number;
  /** Restarts before giving up with PLACEMENT_STALLED */
  readonly maxLayouts?: number;
  readonly owner?: PlayerSide;
}

export const DEFAULT_MAX_ATTEMPTS_PER_SHIP = 200;
export const DEFAULT_MAX_LAYOUTS = 100;

// =============================================================================
// Human Placement
// =============================================================================

export class FleetBuilder {
  private readonly board: Board;

  constructor(owner: PlayerSide = 'player') {
    this.board = new Board(owner);
  }

  /**
   * Parses and applies one declared placement, e.g. `place('A1', 'A4')`.
   */
  place(startToken: string, endToken: string): PlacementAttempt {
    return this.attempt(() => {
      const start = parseCoordinate(startToken);
      const end = parseCoordinate(endToken);
      return this.board.placeShip(start, end);
    });
  }

  placeCoordinates(start: Coordinate, end: Coordinate): PlacementAttempt {
    return this.attempt(() => this.board.placeShip(start, end));
  }

  remaining(): RosterCount {
    return this.board.remainingRoster();
  }

  isComplete(): boolean {
    return this.board.isFleetComplete();
  }

  placedShips(): ShipSnapshot[] {
    return this.board.getShips();
  }

  /** The board so far, as its owner sees it */
  view(): CellView[][] {
    return this.board.view('owner');
  }

  /**
   * Hands over the finished board.
   * @throws GameRuleError FLEET_INCOMPLETE until all ten ships are placed
   */
  build(): Board {
    if (!this.board.isFleetComplete()) {
      const placed = this.board.getShips().length;
      throw new GameRuleError(
        'FLEET_INCOMPLETE',
        `Fleet has ${placed} of 10 ships placed`
      );
    }
    return this.board;
  }

  private attempt(place: () => ShipSnapshot): PlacementAttempt {
    try {
      const ship = place();
      return { accepted: true, ship, remaining: this.board.remainingRoster() };
    } catch (error) {
      if (isGameRuleError(error)) {
        return { accepted: false, code: error.code, message: error.message };
      }
      throw error;
    }
  }
}

// =============================================================================
// Bot Placement
// =============================================================================

const ORIENTATIONS: readonly Orientation[] = ['horizontal', 'vertical'];

/**
 * Random in-bounds endpoints for a ship of the given size.
 */
function randomSpan(
  random: RandomSource,
  size: ShipSize
): { start: Coordinate; end: Coordinate } {
  const orientation = pickOne(random, ORIENTATIONS);

  if (orientation === 'horizontal') {
    const row = random.nextInt(GRID_SIZE);
    const col = random.nextInt(GRID_SIZE - size + 1);
    return { start: { row, col }, end: { row, col: col + size - 1 } };
  }

  const row = random.nextInt(GRID_SIZE - size + 1);
  const col = random.nextInt(GRID_SIZE);
  return { start: { row, col }, end: { row: row + size - 1, col } };
}

/**
 * Tries to fill one board. Returns null when a ship could not be placed
 * within the attempt budget.
 */
function tryLayout(
  random: RandomSource,
  owner: PlayerSide,
  maxAttemptsPerShip: number
): Board | null {
  const board = new Board(owner);
  let rejections = 0;

  while (!board.isFleetComplete()) {
    if (rejections >= maxAttemptsPerShip) {
      return null;
    }

    const size = pickOne(random, neededSizes(board.getShips()));
    const { start, end } = randomSpan(random, size);

    try {
      board.placeShip(start, end);
      rejections = 0;
    } catch (error) {
      if (!isGameRuleError(error)) {
        throw error;
      }
      rejections++;
    }
  }

  return board;
}

/**
 * Generates a complete, valid fleet with no outside input.
 *
 * @throws GameRuleError PLACEMENT_STALLED if every layout attempt stalls
 */
export function generateBotFleet(options: BotFleetOptions = {}): Board {
  const random = options.random ?? createRandom();
  const owner = options.owner ?? 'bot';
  const maxAttemptsPerShip = options.maxAttemptsPerShip ?? DEFAULT_MAX_ATTEMPTS_PER_SHIP;
  const maxLayouts = options.maxLayouts ?? DEFAULT_MAX_LAYOUTS;

  for (let layout = 0; layout < maxLayouts; layout++) {
    const board = tryLayout(random, owner, maxAttemptsPerShip);
    if (board) {
      return board;
    }
  }

  throw new GameRuleError(
    'PLACEMENT_STALLED',
    `Failed to generate a valid fleet after ${maxLayouts} layouts`
  );
}
