// Fleet Duel - Game Engine
//
// Turn state machine for one human-vs-bot game:
//
//   awaiting_player_shot --player shot--> awaiting_bot_shot --bot shot--> awaiting_player_shot
//            |                                      |
//            +--- bot fleet sunk ---> game_over(player)
//                                                   +--- player fleet sunk ---> game_over(bot)
//
// The engine holds references to both boards and is their only writer once
// the game starts. Every shot is resolved synchronously and completely before
// the call returns; a rejected shot leaves everything unchanged.

import { EventEmitter } from 'events';
import { Board } from './board.js';
import { GameRuleError, isGameRuleError } from './errors.js';
import { formatCoordinate, parseCoordinate } from './coordinates.js';
import { RandomSource, createRandom, pickOne } from './random.js';
import {
  MoveLogRow,
  ShipRecord,
  parseSerializedGame,
  rebuildBoard,
  toMoveLogRows,
  toShipRecords,
} from './persistence.js';
import {
  Coordinate,
  EnginePhase,
  PlayerSide,
  RoundResult,
  ShotRecord,
  ShotResolution,
} from './types.js';

// =============================================================================
// Types
// =============================================================================

export interface GameEngineConfig {
  readonly playerBoard: Board;
  readonly botBoard: Board;
  /** Drives the bot's target selection */
  readonly random?: RandomSource;
}

export interface ShipSunkEvent {
  readonly turn: number;
  readonly shooter: PlayerSide;
  readonly shipId: string;
  readonly size: number;
  readonly autoMissed: readonly Coordinate[];
}

export interface GameOverEvent {
  readonly winner: PlayerSide;
  readonly totalTurns: number;
}

/**
 * Serialized game for persistence: both fleets as ship records and the move log
 */
export interface SerializedGame {
  playerShips: ShipRecord[];
  botShips: ShipRecord[];
  moves: MoveLogRow[];
}

// =============================================================================
// GameEngine Class
// =============================================================================

export class GameEngine extends EventEmitter {
  private readonly playerBoard: Board;
  private readonly botBoard: Board;
  private readonly random: RandomSource;
  private phase: EnginePhase;
  private turn: number;
  private readonly history: ShotRecord[];
  private pendingPlayerShot: ShotRecord | null;

  /**
   * @throws GameRuleError FLEET_INCOMPLETE unless both boards carry the full roster
   */
  constructor(config: GameEngineConfig) {
    super();

    for (const board of [config.playerBoard, config.botBoard]) {
      if (!board.isFleetComplete()) {
        throw new GameRuleError(
          'FLEET_INCOMPLETE',
          `The ${board.owner} fleet must be complete before the game starts`
        );
      }
    }

    this.playerBoard = config.playerBoard;
    this.botBoard = config.botBoard;
    this.random = config.random ?? createRandom();
    this.phase = { kind: 'awaiting_player_shot' };
    this.turn = 1;
    this.history = [];
    this.pendingPlayerShot = null;
  }

  // ===========================================================================
  // Shots
  // ===========================================================================

  /**
   * Resolves the human's shot against the bot's board.
   *
   * @throws GameRuleError OUT_OF_TURN, GAME_OVER, ALREADY_FIRED or INVALID_COORDINATE
   */
  firePlayerShot(target: Coordinate): ShotRecord {
    this.assertPhase('awaiting_player_shot');

    const record = this.resolve('player', this.botBoard, target);
    this.pendingPlayerShot = record;

    if (this.botBoard.allShipsSunk()) {
      this.finishRound(null);
      this.endGame('player');
    } else {
      this.phase = { kind: 'awaiting_bot_shot' };
    }

    return record;
  }

  /**
   * Resolves the bot's shot against the player's board. Without a target the
   * bot picks uniformly among the player's unfired cells; an explicit target
   * is used when replaying a recorded game.
   *
   * @throws GameRuleError OUT_OF_TURN, GAME_OVER, or ALREADY_FIRED for a replayed target
   */
  fireBotShot(target?: Coordinate): ShotRecord {
    this.assertPhase('awaiting_bot_shot');

    const chosen = target ?? pickOne(this.random, this.playerBoard.unfiredCoordinates());
    const record = this.resolve('bot', this.playerBoard, chosen);

    this.finishRound(record);

    if (this.playerBoard.allShipsSunk()) {
      this.endGame('bot');
    } else {
      this.turn++;
      this.phase = { kind: 'awaiting_player_shot' };
    }

    return record;
  }

  /**
   * Player shot followed by the bot's reply, unless the player's shot won.
   */
  playRound(target: Coordinate): RoundResult {
    const turn = this.turn;
    const player = this.firePlayerShot(target);
    const bot = this.isGameOver() ? null : this.fireBotShot();
    return { turn, player, bot };
  }

  private resolve(shooter: PlayerSide, board: Board, target: Coordinate): ShotRecord {
    const resolution: ShotResolution = board.receiveShot(target);

    const record: ShotRecord = {
      turn: this.turn,
      shooter,
      target: resolution.target,
      outcome: resolution.outcome,
      sunkShipId: resolution.sunkShip?.id ?? null,
      autoMissed: resolution.autoMissed,
    };
    this.history.push(record);

    this.emit('shot_resolved', record);

    if (resolution.sunkShip) {
      const event: ShipSunkEvent = {
        turn: this.turn,
        shooter,
        shipId: resolution.sunkShip.id,
        size: resolution.sunkShip.size,
        autoMissed: resolution.autoMissed,
      };
      this.emit('ship_sunk', event);
    }

    return record;
  }

  private finishRound(bot: ShotRecord | null): void {
    const player = this.pendingPlayerShot;
    this.pendingPlayerShot = null;
    if (!player) return;

    const round: RoundResult = { turn: this.turn, player, bot };
    this.emit('round_complete', round);
  }

  private endGame(winner: PlayerSide): void {
    this.phase = { kind: 'game_over', winner };
    const event: GameOverEvent = { winner, totalTurns: this.turn };
    this.emit('game_over', event);
  }

  private assertPhase(expected: 'awaiting_player_shot' | 'awaiting_bot_shot'): void {
    if (this.phase.kind === 'game_over') {
      throw new GameRuleError(
        'GAME_OVER',
        `Game is already over, ${this.phase.winner} won`
      );
    }
    if (this.phase.kind !== expected) {
      const waitingFor = this.phase.kind === 'awaiting_player_shot' ? 'player' : 'bot';
      throw new GameRuleError('OUT_OF_TURN', `It is the ${waitingFor}'s turn`);
    }
  }

  // ===========================================================================
  // State Access Methods
  // ===========================================================================

  getPhase(): EnginePhase {
    return this.phase;
  }

  getTurn(): number {
    return this.turn;
  }

  isGameOver(): boolean {
    return this.phase.kind === 'game_over';
  }

  getWinner(): PlayerSide | null {
    return this.phase.kind === 'game_over' ? this.phase.winner : null;
  }

  getShotHistory(): readonly ShotRecord[] {
    return [...this.history];
  }

  /**
   * Rounds in order. The last one has `bot: null` when the player won it or
   * when the bot has not replied yet.
   */
  getRounds(): RoundResult[] {
    const rounds: RoundResult[] = [];

    for (let i = 0; i < this.history.length; i++) {
      const player = this.history[i];
      const next = this.history[i + 1];
      const bot = next && next.shooter === 'bot' ? next : null;
      rounds.push({ turn: player.turn, player, bot });
      if (bot) i++;
    }

    return rounds;
  }

  getMoveLog(): MoveLogRow[] {
    return toMoveLogRows(this.getRounds());
  }

  getPlayerBoard(): Board {
    return this.playerBoard;
  }

  getBotBoard(): Board {
    return this.botBoard;
  }

  // ===========================================================================
  // Serialization
  // ===========================================================================

  serialize(): string {
    const state: SerializedGame = {
      playerShips: toShipRecords(this.playerBoard.getShips()),
      botShips: toShipRecords(this.botBoard.getShips()),
      moves: this.getMoveLog(),
    };
    return JSON.stringify(state);
  }

  /**
   * Rebuilds both fleets and replays the move log.
   * @throws GameRuleError INVALID_RECORD when the snapshot is inconsistent
   */
  static deserialize(json: string, random?: RandomSource): GameEngine {
    const state = parseSerializedGame(json);
    return GameEngine.recover(
      rebuildBoard('player', state.playerShips),
      rebuildBoard('bot', state.botShips),
      state.moves,
      random
    );
  }

  /**
   * Replays a recorded move log onto freshly rebuilt boards. Every recorded
   * outcome is checked against what the boards actually produce.
   *
   * @throws GameRuleError INVALID_RECORD on the first row that does not replay
   */
  static recover(
    playerBoard: Board,
    botBoard: Board,
    moves: readonly MoveLogRow[],
    random?: RandomSource
  ): GameEngine {
    const engine = new GameEngine({ playerBoard, botBoard, random });

    for (const row of moves) {
      try {
        engine.replayRow(row);
      } catch (error) {
        if (isGameRuleError(error) && error.code !== 'INVALID_RECORD') {
          throw new GameRuleError('INVALID_RECORD', `Turn ${row.turn}: ${error.message}`);
        }
        throw error;
      }
    }

    return engine;
  }

  private replayRow(row: MoveLogRow): void {
    if (row.turn !== this.turn) {
      throw new GameRuleError(
        'INVALID_RECORD',
        `Turn ${row.turn}: expected turn ${this.turn}`
      );
    }

    const player = this.firePlayerShot(parseCoordinate(row.playerMove));
    this.checkOutcome(row.turn, player, row.playerResult);

    if (row.botMove === '') {
      if (row.botResult !== 'miss') {
        throw new GameRuleError(
          'INVALID_RECORD',
          `Turn ${row.turn}: bot result is ${row.botResult} but no bot move was recorded`
        );
      }
      return;
    }

    const bot = this.fireBotShot(parseCoordinate(row.botMove));
    this.checkOutcome(row.turn, bot, row.botResult);
  }

  private checkOutcome(turn: number, record: ShotRecord, expected: 'hit' | 'miss'): void {
    if (record.outcome !== expected) {
      throw new GameRuleError(
        'INVALID_RECORD',
        `Turn ${turn}: ${record.shooter} shot at ${formatCoordinate(record.target)} ` +
          `was recorded as ${expected} but resolves as ${record.outcome}`
      );
    }
  }
}
