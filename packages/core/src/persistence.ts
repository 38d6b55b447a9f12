// Fleet Duel - Persistence Shapes
//
// Fleets are stored as (start, end, size) rows and the game as one row per
// round: (turn, player_move, player_hit, bot_move, bot_hit). This module only
// converts between those shapes and the core's objects; reading and writing
// files is the caller's business.

import { z } from 'zod';
import { fromZodError } from 'zod-validation-error';
import { Board } from './board.js';
import { GameRuleError, isGameRuleError } from './errors.js';
import { formatCoordinate, parseCoordinate } from './coordinates.js';
import { PlayerSide, RoundResult, ShipSnapshot } from './types.js';

// =============================================================================
// Schemas
// =============================================================================

export const shipRecordSchema = z.object({
  start: z.string().min(2),
  end: z.string().min(2),
  size: z.coerce.number().int().min(1).max(4),
});

export type ShipRecord = z.infer<typeof shipRecordSchema>;

const shotResultSchema = z.enum(['hit', 'miss']);

export const moveLogRowSchema = z.object({
  turn: z.coerce.number().int().positive(),
  playerMove: z.string().min(2),
  playerResult: shotResultSchema,
  botMove: z.string(),
  botResult: shotResultSchema,
});

export type MoveLogRow = z.infer<typeof moveLogRowSchema>;

const serializedGameSchema = z.object({
  playerShips: z.array(shipRecordSchema),
  botShips: z.array(shipRecordSchema),
  moves: z.array(moveLogRowSchema),
});

export const SHIPS_CSV_HEADER = ['start', 'end', 'size'] as const;
export const MOVES_CSV_HEADER = ['turn', 'player_move', 'player_hit', 'bot_move', 'bot_hit'] as const;

// =============================================================================
// Ships
// =============================================================================

export function toShipRecords(ships: readonly ShipSnapshot[]): ShipRecord[] {
  return ships.map(ship => ({
    start: formatCoordinate(ship.cells[0]),
    end: formatCoordinate(ship.cells[ship.cells.length - 1]),
    size: ship.size,
  }));
}

export function formatShipsCsv(ships: readonly ShipSnapshot[]): string {
  const lines = [SHIPS_CSV_HEADER.join(',')];
  for (const record of toShipRecords(ships)) {
    lines.push(`${record.start},${record.end},${record.size}`);
  }
  return lines.join('\n') + '\n';
}

export function parseShipsCsv(csv: string): ShipRecord[] {
  return parseCsv(csv, SHIPS_CSV_HEADER).map((fields, i) =>
    validateRecord(shipRecordSchema, {
      start: fields[0],
      end: fields[1],
      size: fields[2],
    }, `Ship row ${i + 1}`)
  );
}

/**
 * Places every recorded ship on a new board, in order, through the regular
 * placement rules.
 *
 * @throws GameRuleError INVALID_RECORD for a row that does not place,
 * FLEET_INCOMPLETE when the rows do not make up the full roster
 */
export function rebuildBoard(owner: PlayerSide, records: readonly ShipRecord[]): Board {
  const board = new Board(owner);

  records.forEach((record, i) => {
    const label = `Ship ${i + 1} (${record.start}-${record.end})`;
    try {
      const ship = board.placeShip(parseCoordinate(record.start), parseCoordinate(record.end));
      if (ship.size !== record.size) {
        throw new GameRuleError(
          'INVALID_RECORD',
          `${label}: spans ${ship.size} cells but is recorded as size ${record.size}`
        );
      }
    } catch (error) {
      if (isGameRuleError(error) && error.code !== 'INVALID_RECORD') {
        throw new GameRuleError('INVALID_RECORD', `${label}: ${error.message}`);
      }
      throw error;
    }
  });

  if (!board.isFleetComplete()) {
    throw new GameRuleError(
      'FLEET_INCOMPLETE',
      `The ${owner} fleet has ${records.length} of 10 ships`
    );
  }

  return board;
}

// =============================================================================
// Move Log
// =============================================================================

/**
 * One row per round. A round with no bot reply has an empty bot move, and its
 * bot result is written as `miss`.
 */
export function toMoveLogRows(rounds: readonly RoundResult[]): MoveLogRow[] {
  return rounds.map(round => ({
    turn: round.turn,
    playerMove: formatCoordinate(round.player.target),
    playerResult: round.player.outcome,
    botMove: round.bot ? formatCoordinate(round.bot.target) : '',
    botResult: round.bot ? round.bot.outcome : 'miss',
  }));
}

export function formatMoveLogCsv(rows: readonly MoveLogRow[]): string {
  const lines = [MOVES_CSV_HEADER.join(',')];
  for (const row of rows) {
    lines.push(
      [row.turn, row.playerMove, row.playerResult, row.botMove, row.botResult].join(',')
    );
  }
  return lines.join('\n') + '\n';
}

export function parseMoveLogCsv(csv: string): MoveLogRow[] {
  return parseCsv(csv, MOVES_CSV_HEADER).map((fields, i) =>
    validateRecord(moveLogRowSchema, {
      turn: fields[0],
      playerMove: fields[1],
      playerResult: fields[2],
      botMove: fields[3],
      botResult: fields[4],
    }, `Move row ${i + 1}`)
  );
}

// =============================================================================
// Serialized Game
// =============================================================================

export function parseSerializedGame(json: string): z.infer<typeof serializedGameSchema> {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new GameRuleError('INVALID_RECORD', `Game snapshot is not valid JSON: ${reason}`);
  }
  return validateRecord(serializedGameSchema, raw, 'Game snapshot');
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Splits a CSV document into data rows after checking its header.
 * Fields are plain tokens, so no quoting is supported.
 */
function parseCsv(csv: string, header: readonly string[]): string[][] {
  const lines = csv
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0);

  if (lines.length === 0) {
    throw new GameRuleError('INVALID_RECORD', 'CSV is empty');
  }

  const actual = lines[0].split(',').map(field => field.trim().toLowerCase());
  if (actual.join(',') !== header.join(',')) {
    throw new GameRuleError(
      'INVALID_RECORD',
      `Expected CSV header "${header.join(',')}", got "${lines[0]}"`
    );
  }

  return lines.slice(1).map((line, i) => {
    const fields = line.split(',').map(field => field.trim());
    if (fields.length !== header.length) {
      throw new GameRuleError(
        'INVALID_RECORD',
        `Row ${i + 1} has ${fields.length} fields, expected ${header.length}`
      );
    }
    return fields;
  });
}

function validateRecord<T extends z.ZodTypeAny>(
  schema: T,
  value: unknown,
  label: string
): z.infer<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new GameRuleError(
      'INVALID_RECORD',
      fromZodError(result.error, { prefix: label }).message
    );
  }
  return result.data;
}
