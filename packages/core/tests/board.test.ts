import { describe, it, expect, beforeEach } from 'vitest';
import { Board } from '../src/board.js';
import { at, buildFixedBoard, errorOf, labels } from './fixtures.js';

// =============================================================================
// Shot Resolution
// =============================================================================

describe('Board.receiveShot', () => {
  let board: Board;

  beforeEach(() => {
    board = new Board('bot');
    board.placeShip(at('E5'), at('E5'));
    board.placeShip(at('H2'), at('H3'));
  });

  it('records a miss on open water', () => {
    const result = board.receiveShot(at('A1'));

    expect(result.outcome).toBe('miss');
    expect(result.sunkShip).toBeNull();
    expect(result.autoMissed).toEqual([]);
    expect(board.outcomeAt(at('A1'))).toBe('miss');
  });

  it('sinks a single-cell ship and auto-misses its whole ring', () => {
    const result = board.receiveShot(at('E5'));

    expect(result.outcome).toBe('hit');
    expect(result.sunkShip?.id).toBe('ship-1');
    expect(result.sunkShip?.isSunk).toBe(true);
    expect(labels(result.autoMissed)).toEqual([
      'D4', 'D5', 'D6', 'E4', 'E6', 'F4', 'F5', 'F6',
    ]);
    for (const token of ['D4', 'D5', 'D6', 'E4', 'E6', 'F4', 'F5', 'F6']) {
      expect(board.outcomeAt(at(token))).toBe('auto_miss');
    }
    expect(board.outcomeAt(at('E5'))).toBe('hit');
  });

  it('records a hit without sinking a larger ship', () => {
    const result = board.receiveShot(at('H2'));

    expect(result.outcome).toBe('hit');
    expect(result.sunkShip).toBeNull();
    expect(result.autoMissed).toEqual([]);
    expect(board.outcomeAt(at('G2'))).toBe('unfired');
  });

  it('never overwrites earlier outcomes when marking the ring', () => {
    board.receiveShot(at('G1'));
    board.receiveShot(at('H2'));
    const result = board.receiveShot(at('H3'));

    expect(result.sunkShip?.id).toBe('ship-2');
    expect(labels(result.autoMissed)).toEqual([
      'G2', 'G3', 'G4', 'H1', 'H4', 'I1', 'I2', 'I3', 'I4',
    ]);
    expect(board.outcomeAt(at('G1'))).toBe('miss');
    expect(board.outcomeAt(at('H2'))).toBe('hit');
    expect(board.outcomeAt(at('H3'))).toBe('hit');
  });

  it('rejects firing twice at J10 and keeps the log intact', () => {
    const first = board.receiveShot(at('J10'));
    expect(first.outcome).toBe('miss');
    const logBefore = board.getShotLog();

    const error = errorOf(() => board.receiveShot(at('J10')));

    expect(error.code).toBe('ALREADY_FIRED');
    expect(error.message).toBe('Cell J10 already shot (miss)');
    expect(board.getShotLog()).toEqual(logBefore);
  });

  it('rejects firing at an auto-missed cell', () => {
    board.receiveShot(at('E5'));
    const logBefore = board.getShotLog();

    const error = errorOf(() => board.receiveShot(at('F6')));

    expect(error.code).toBe('ALREADY_FIRED');
    expect(error.message).toBe('Cell F6 already shot (auto_miss)');
    expect(board.getShotLog()).toEqual(logBefore);
  });

  it('rejects off-board targets', () => {
    expect(errorOf(() => board.receiveShot({ row: 10, col: 0 })).code).toBe(
      'INVALID_COORDINATE'
    );
    expect(board.getShotLog()).toEqual([]);
  });
});

// =============================================================================
// Fleet State
// =============================================================================

describe('Board fleet state', () => {
  it('tracks floating ships until every cell is hit', () => {
    const board = buildFixedBoard('player');
    expect(board.floatingShipCount()).toBe(10);
    expect(board.allShipsSunk()).toBe(false);

    for (const ship of board.getShips()) {
      for (const cell of ship.cells) {
        board.receiveShot(cell);
      }
    }

    expect(board.floatingShipCount()).toBe(0);
    expect(board.allShipsSunk()).toBe(true);
    expect(board.getShips().every(ship => ship.hits.length === ship.size)).toBe(true);
  });

  it('excludes every outcomed cell from the unfired list', () => {
    const board = new Board('player');
    board.placeShip(at('A1'), at('A1'));
    board.receiveShot(at('A1'));
    board.receiveShot(at('J10'));

    const unfired = labels(board.unfiredCoordinates());
    expect(unfired).toHaveLength(100 - 1 - 3 - 1);
    expect(unfired).not.toContain('A1');
    expect(unfired).not.toContain('A2');
    expect(unfired).not.toContain('B1');
    expect(unfired).not.toContain('B2');
    expect(unfired).not.toContain('J10');
    expect(unfired[0]).toBe('A3');
  });

  it('lists the shot log in row-major order', () => {
    const board = new Board('player');
    board.receiveShot(at('J10'));
    board.receiveShot(at('B2'));

    expect(board.getShotLog()).toEqual([
      { target: { row: 1, col: 1 }, outcome: 'miss' },
      { target: { row: 9, col: 9 }, outcome: 'miss' },
    ]);
  });
});

// =============================================================================
// Views
// =============================================================================

describe('Board.view', () => {
  it('shows intact ships to the owner only', () => {
    const board = new Board('player');
    board.placeShip(at('B2'), at('B3'));

    expect(board.view('owner')[1].slice(0, 4)).toEqual(['water', 'ship', 'ship', 'water']);
    expect(board.view('opponent')[1].slice(0, 4)).toEqual([
      'unknown', 'unknown', 'unknown', 'unknown',
    ]);
  });

  it('shows shot outcomes to both sides', () => {
    const board = new Board('player');
    board.placeShip(at('B2'), at('B3'));
    board.receiveShot(at('B2'));
    board.receiveShot(at('B5'));

    expect(board.view('owner')[1].slice(0, 5)).toEqual(['water', 'hit', 'ship', 'water', 'miss']);
    expect(board.view('opponent')[1].slice(0, 5)).toEqual([
      'unknown', 'hit', 'unknown', 'unknown', 'miss',
    ]);
  });
});
