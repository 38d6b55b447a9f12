import { describe, it, expect } from 'vitest';
import { FleetBuilder, generateBotFleet } from '../src/fleet-builder.js';
import { SeededRandom } from '../src/random.js';
import { TOTAL_SHIP_CELLS, type ShipSnapshot } from '../src/types.js';
import { FIXED_FLEET, errorOf, firstChoice, seedOf } from './fixtures.js';

// =============================================================================
// Helper Functions
// =============================================================================

function chebyshev(a: { row: number; col: number }, b: { row: number; col: number }): number {
  return Math.max(Math.abs(a.row - b.row), Math.abs(a.col - b.col));
}

function shipsTouch(a: ShipSnapshot, b: ShipSnapshot): boolean {
  return a.cells.some(x => b.cells.some(y => chebyshev(x, y) <= 1));
}

function sortedSizes(ships: readonly ShipSnapshot[]): number[] {
  return ships.map(s => s.size).sort((a, b) => a - b);
}

// =============================================================================
// Human Placement
// =============================================================================

describe('FleetBuilder', () => {
  it('accepts a valid placement and reports the remaining roster', () => {
    const builder = new FleetBuilder();
    const attempt = builder.place('A1', 'A4');

    expect(attempt.accepted).toBe(true);
    if (attempt.accepted) {
      expect(attempt.ship.size).toBe(4);
      expect(attempt.remaining).toEqual({ 1: 4, 2: 3, 3: 2, 4: 0 });
    }
  });

  it('reports the rejection reason instead of throwing', () => {
    const builder = new FleetBuilder();
    builder.place('A1', 'A4');

    expect(builder.place('B1', 'B3')).toEqual({
      accepted: false,
      code: 'ADJACENT_SHIPS',
      message: 'B1 touches the ship at A1',
    });
    expect(builder.place('C1', 'C3').accepted).toBe(true);
  });

  it('reports malformed tokens and bent ships', () => {
    const builder = new FleetBuilder();

    expect(builder.place('K1', 'K2')).toMatchObject({
      accepted: false,
      code: 'INVALID_COORDINATE',
    });
    expect(builder.place('C1', 'D2')).toMatchObject({
      accepted: false,
      code: 'NOT_COLLINEAR',
    });
    expect(builder.placedShips()).toEqual([]);
  });

  it('places ships from grid coordinates', () => {
    const builder = new FleetBuilder();
    const attempt = builder.placeCoordinates({ row: 0, col: 0 }, { row: 0, col: 3 });

    expect(attempt.accepted).toBe(true);
    if (attempt.accepted) {
      expect(attempt.ship.size).toBe(4);
      expect(attempt.remaining).toEqual({ 1: 4, 2: 3, 3: 2, 4: 0 });
    }
  });

  it('rejects grid coordinates off the board', () => {
    const builder = new FleetBuilder();

    expect(builder.placeCoordinates({ row: 10, col: 0 }, { row: 10, col: 0 })).toEqual({
      accepted: false,
      code: 'INVALID_COORDINATE',
      message: 'Invalid position: row=10, col=0',
    });
    expect(builder.placeCoordinates({ row: 9, col: 9 }, { row: 9, col: 10 })).toMatchObject({
      accepted: false,
      code: 'INVALID_COORDINATE',
    });
    expect(builder.placedShips()).toEqual([]);
  });

  it('accepts placements in any order', () => {
    const builder = new FleetBuilder();
    for (const [start, end] of [...FIXED_FLEET].reverse()) {
      expect(builder.place(start, end).accepted).toBe(true);
    }
    expect(builder.isComplete()).toBe(true);
  });

  it('refuses to build until all ten ships are placed', () => {
    const builder = new FleetBuilder();
    builder.place('A1', 'A4');

    const error = errorOf(() => builder.build());
    expect(error.code).toBe('FLEET_INCOMPLETE');
    expect(error.message).toBe('Fleet has 1 of 10 ships placed');
  });

  it('builds the board once the roster is complete', () => {
    const builder = new FleetBuilder('player');
    for (const [start, end] of FIXED_FLEET) {
      builder.place(start, end);
    }

    const board = builder.build();
    expect(board.owner).toBe('player');
    expect(board.getShips()).toHaveLength(10);
    expect(builder.remaining()).toEqual({ 1: 0, 2: 0, 3: 0, 4: 0 });
  });

  it('rejects an eleventh ship', () => {
    const builder = new FleetBuilder();
    for (const [start, end] of FIXED_FLEET) {
      builder.place(start, end);
    }

    expect(builder.place('J10', 'J10')).toMatchObject({
      accepted: false,
      code: 'ROSTER_EXHAUSTED',
    });
  });
});

// =============================================================================
// Bot Placement
// =============================================================================

describe('generateBotFleet', () => {
  const seeds = Array.from({ length: 25 }, (_, i) => seedOf(i + 1));

  it('always produces the full roster', () => {
    for (const seed of seeds) {
      const board = generateBotFleet({ random: new SeededRandom(seed) });
      const ships = board.getShips();

      expect(board.owner).toBe('bot');
      expect(board.isFleetComplete()).toBe(true);
      expect(sortedSizes(ships)).toEqual([1, 1, 1, 1, 2, 2, 2, 3, 3, 4]);
      expect(ships.reduce((sum, s) => sum + s.cells.length, 0)).toBe(TOTAL_SHIP_CELLS);
    }
  });

  it('never lets two ships touch, diagonals included', () => {
    for (const seed of seeds) {
      const ships = generateBotFleet({ random: new SeededRandom(seed) }).getShips();

      for (let i = 0; i < ships.length; i++) {
        for (let j = i + 1; j < ships.length; j++) {
          expect(shipsTouch(ships[i], ships[j])).toBe(false);
        }
      }
    }
  });

  it('is reproducible from a seed', () => {
    const a = generateBotFleet({ random: new SeededRandom(seedOf(7)) }).getShips();
    const b = generateBotFleet({ random: new SeededRandom(seedOf(7)) }).getShips();

    expect(a).toEqual(b);
  });

  it('fails with PLACEMENT_STALLED when no layout converges', () => {
    const error = errorOf(() =>
      generateBotFleet({ random: firstChoice, maxAttemptsPerShip: 5, maxLayouts: 3 })
    );

    expect(error.code).toBe('PLACEMENT_STALLED');
    expect(error.message).toBe('Failed to generate a valid fleet after 3 layouts');
    expect(error.isRecoverable).toBe(false);
  });
});
