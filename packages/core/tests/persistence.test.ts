import { describe, it, expect } from 'vitest';
import {
  formatShipsCsv,
  parseShipsCsv,
  rebuildBoard,
  toShipRecords,
  formatMoveLogCsv,
  parseMoveLogCsv,
  type MoveLogRow,
} from '../src/persistence.js';
import { buildFixedBoard, errorOf } from './fixtures.js';

const FIXED_FLEET_CSV = [
  'start,end,size',
  'A1,A4,4',
  'A6,A8,3',
  'C1,C3,3',
  'C5,C6,2',
  'C8,C9,2',
  'E1,E2,2',
  'E4,E4,1',
  'E6,E6,1',
  'E8,E8,1',
  'G1,G1,1',
  '',
].join('\n');

// =============================================================================
// Ships
// =============================================================================

describe('ships CSV', () => {
  it('writes one start,end,size row per ship', () => {
    expect(formatShipsCsv(buildFixedBoard('player').getShips())).toBe(FIXED_FLEET_CSV);
  });

  it('reads rows back into records', () => {
    const records = parseShipsCsv(FIXED_FLEET_CSV);

    expect(records).toHaveLength(10);
    expect(records[0]).toEqual({ start: 'A1', end: 'A4', size: 4 });
    expect(records[9]).toEqual({ start: 'G1', end: 'G1', size: 1 });
  });

  it('tolerates CRLF line endings and blank lines', () => {
    const csv = 'start,end,size\r\nA1,A4,4\r\n\r\nB6,B6,1\r\n';
    expect(parseShipsCsv(csv)).toEqual([
      { start: 'A1', end: 'A4', size: 4 },
      { start: 'B6', end: 'B6', size: 1 },
    ]);
  });

  it('rejects a wrong header', () => {
    const error = errorOf(() => parseShipsCsv('a,b,c\nA1,A4,4'));
    expect(error.code).toBe('INVALID_RECORD');
    expect(error.message).toBe('Expected CSV header "start,end,size", got "a,b,c"');
  });

  it('rejects rows with the wrong number of fields', () => {
    const error = errorOf(() => parseShipsCsv('start,end,size\nA1,A4'));
    expect(error.code).toBe('INVALID_RECORD');
    expect(error.message).toBe('Row 1 has 2 fields, expected 3');
  });

  it('rejects a non-numeric size', () => {
    const error = errorOf(() => parseShipsCsv('start,end,size\nA1,A4,big'));
    expect(error.code).toBe('INVALID_RECORD');
    expect(error.message.startsWith('Ship row 1')).toBe(true);
  });
});

describe('rebuildBoard', () => {
  it('rebuilds the same fleet through the placement rules', () => {
    const original = buildFixedBoard('player');
    const rebuilt = rebuildBoard('player', toShipRecords(original.getShips()));

    expect(rebuilt.owner).toBe('player');
    expect(rebuilt.getShips()).toEqual(original.getShips());
  });

  it('rejects a size that does not match the span', () => {
    const error = errorOf(() => rebuildBoard('player', [{ start: 'A1', end: 'A4', size: 3 }]));
    expect(error.code).toBe('INVALID_RECORD');
    expect(error.message).toBe('Ship 1 (A1-A4): spans 4 cells but is recorded as size 3');
  });

  it('rejects ships that break placement rules', () => {
    const error = errorOf(() =>
      rebuildBoard('player', [
        { start: 'A1', end: 'A4', size: 4 },
        { start: 'B1', end: 'B3', size: 3 },
      ])
    );
    expect(error.code).toBe('INVALID_RECORD');
    expect(error.message).toBe('Ship 2 (B1-B3): B1 touches the ship at A1');
  });

  it('rejects an incomplete fleet', () => {
    const error = errorOf(() => rebuildBoard('bot', [{ start: 'A1', end: 'A4', size: 4 }]));
    expect(error.code).toBe('FLEET_INCOMPLETE');
    expect(error.message).toBe('The bot fleet has 1 of 10 ships');
  });
});

// =============================================================================
// Move Log
// =============================================================================

describe('move log CSV', () => {
  const rows: MoveLogRow[] = [
    { turn: 1, playerMove: 'A1', playerResult: 'hit', botMove: 'J10', botResult: 'miss' },
    { turn: 2, playerMove: 'B2', playerResult: 'miss', botMove: '', botResult: 'miss' },
  ];

  it('writes the turn,player_move,player_hit,bot_move,bot_hit layout', () => {
    expect(formatMoveLogCsv(rows)).toBe(
      'turn,player_move,player_hit,bot_move,bot_hit\n1,A1,hit,J10,miss\n2,B2,miss,,miss\n'
    );
  });

  it('reads the layout back, keeping empty bot moves', () => {
    expect(parseMoveLogCsv(formatMoveLogCsv(rows))).toEqual(rows);
  });

  it('writes only the header for an empty log', () => {
    expect(formatMoveLogCsv([])).toBe('turn,player_move,player_hit,bot_move,bot_hit\n');
    expect(parseMoveLogCsv('turn,player_move,player_hit,bot_move,bot_hit\n')).toEqual([]);
  });

  it('rejects an unknown result', () => {
    const error = errorOf(() =>
      parseMoveLogCsv('turn,player_move,player_hit,bot_move,bot_hit\n1,A1,maybe,B2,hit')
    );
    expect(error.code).toBe('INVALID_RECORD');
    expect(error.message.startsWith('Move row 1')).toBe(true);
  });

  it('rejects an empty document', () => {
    expect(errorOf(() => parseMoveLogCsv('  \n')).message).toBe('CSV is empty');
  });
});
