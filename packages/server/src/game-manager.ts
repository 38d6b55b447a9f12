// Fleet Duel - Game Manager
//
// Keeps every game in memory, drives each one through setup, play and
// completion, and fans engine events out to WebSocket subscribers.

import { EventEmitter } from 'events';
import { randomBytes } from 'crypto';
import {
  FleetBuilder,
  GameEngine,
  SeededRandom,
  formatMoveLogCsv,
  formatShipsCsv,
  generateBotFleet,
  generateRandomSeed,
  isGameRuleError,
  parseCoordinate,
  parseShipsCsv,
  rebuildBoard,
  seedToHex,
  type Board,
  type CellView,
  type GameOverEvent,
  type PlayerSide,
  type RandomSource,
  type RoundResult,
  type ShipSunkEvent,
} from '@fleet-duel/core';
import type {
  GameStatusResponse,
  ManagedGame,
  ManagerError,
  ManagerResult,
  PlaceShipResponse,
  Subscriber,
  WSGameStateMessage,
  WSServerMessage,
} from './types.js';

// =============================================================================
// Options
// =============================================================================

export interface GameManagerOptions {
  /** Shared random source for every game; by default each game seeds its own */
  random?: RandomSource;
  maxAttemptsPerShip?: number;
  maxLayouts?: number;
}

export interface CreateGameOptions {
  gameId?: string;
  seed?: Uint8Array;
  /** Ships CSV that places the whole human fleet at once */
  playerShipsCsv?: string;
}

// =============================================================================
// GameManager
// =============================================================================

export class GameManager extends EventEmitter {
  private games: Map<string, ManagedGame> = new Map();
  private subscriptions: Map<string, Set<Subscriber>> = new Map();
  private readonly options: GameManagerOptions;

  constructor(options: GameManagerOptions = {}) {
    super();
    this.options = options;
  }

  /**
   * Create a game in setup with a freshly generated bot fleet.
   */
  createGame(options: CreateGameOptions = {}): ManagerResult<GameStatusResponse> {
    const gameId = options.gameId ?? `game-${randomBytes(4).toString('hex')}`;
    if (this.games.has(gameId)) {
      return failure('GAME_EXISTS', 'Game already exists');
    }

    const seed = options.seed ?? generateRandomSeed();
    const random = this.options.random ?? new SeededRandom(seed);

    const setup = attempt(() => {
      const botBoard = generateBotFleet({
        random,
        maxAttemptsPerShip: this.options.maxAttemptsPerShip,
        maxLayouts: this.options.maxLayouts,
      });
      const playerBoard = options.playerShipsCsv
        ? rebuildBoard('player', parseShipsCsv(options.playerShipsCsv))
        : null;
      return { botBoard, playerBoard };
    });
    if (!setup.success) {
      return setup;
    }

    const game: ManagedGame = {
      gameId,
      status: 'setup',
      seed,
      random,
      fleet: new FleetBuilder('player'),
      botBoard: setup.value.botBoard,
      engine: null,
      createdAt: Date.now(),
      startedAt: null,
      completedAt: null,
    };

    this.games.set(gameId, game);
    this.subscriptions.set(gameId, new Set());
    this.emit('game_created', { gameId });

    if (setup.value.playerBoard) {
      this.startGame(game, setup.value.playerBoard);
    }

    return { success: true, value: this.describe(game) };
  }

  /**
   * One human placement attempt. The game starts as soon as the roster is complete.
   */
  placeShip(gameId: string, start: string, end: string): ManagerResult<PlaceShipResponse> {
    const game = this.games.get(gameId);
    if (!game) {
      return notFound();
    }
    if (game.status !== 'setup') {
      return failure('INVALID_STATE', 'All ships are already placed');
    }

    const placement = game.fleet.place(start, end);
    if (!placement.accepted) {
      return failure(placement.code, placement.message);
    }

    if (game.fleet.isComplete()) {
      this.startGame(game, game.fleet.build());
    } else {
      this.broadcastGameState(game);
    }

    return {
      success: true,
      value: {
        success: true,
        ship: placement.ship,
        remaining: placement.remaining,
        status: game.status,
      },
    };
  }

  /**
   * Play one round: the human shot at `target`, then the bot's reply.
   */
  fireShot(gameId: string, target: string): ManagerResult<RoundResult> {
    const game = this.games.get(gameId);
    if (!game) {
      return notFound();
    }
    const engine = game.engine;
    if (!engine) {
      return failure('INVALID_STATE', 'Place all ships before firing');
    }

    return attempt(() => engine.playRound(parseCoordinate(target)));
  }

  /**
   * Delete a game and drop its subscribers.
   */
  deleteGame(gameId: string): boolean {
    const game = this.games.get(gameId);
    if (!game) {
      return false;
    }

    game.engine?.removeAllListeners();
    this.games.delete(gameId);
    this.subscriptions.delete(gameId);
    this.emit('game_deleted', { gameId });

    return true;
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  getGameStatus(gameId: string): GameStatusResponse | null {
    const game = this.games.get(gameId);
    return game ? this.describe(game) : null;
  }

  listGames(): GameStatusResponse[] {
    return Array.from(this.games.values(), game => this.describe(game));
  }

  /**
   * A board as the human sees it: their own board in full, the bot's board
   * with intact ships hidden until the game is over.
   */
  getBoardView(gameId: string, owner: PlayerSide): CellView[][] | null {
    const game = this.games.get(gameId);
    if (!game) {
      return null;
    }

    if (owner === 'player') {
      return game.engine ? game.engine.getPlayerBoard().view('owner') : game.fleet.view();
    }
    return game.botBoard.view(game.status === 'complete' ? 'owner' : 'opponent');
  }

  getShipsCsv(gameId: string, owner: PlayerSide): ManagerResult<string> {
    const game = this.games.get(gameId);
    if (!game) {
      return notFound();
    }

    if (owner === 'bot') {
      if (game.status !== 'complete') {
        return failure('INVALID_STATE', 'Bot ships are hidden until the game is over');
      }
      return { success: true, value: formatShipsCsv(game.botBoard.getShips()) };
    }

    const ships = game.engine ? game.engine.getPlayerBoard().getShips() : game.fleet.placedShips();
    return { success: true, value: formatShipsCsv(ships) };
  }

  getMovesCsv(gameId: string): ManagerResult<string> {
    const game = this.games.get(gameId);
    if (!game) {
      return notFound();
    }
    return { success: true, value: formatMoveLogCsv(game.engine?.getMoveLog() ?? []) };
  }

  // ===========================================================================
  // Subscriptions
  // ===========================================================================

  /**
   * Subscribe a socket to game updates. The current state is sent right away.
   */
  subscribe(gameId: string, ws: Subscriber): boolean {
    const subs = this.subscriptions.get(gameId);
    const game = this.games.get(gameId);
    if (!subs || !game) {
      return false;
    }

    subs.add(ws);
    sendToSocket(ws, this.gameStateMessage(game));
    return true;
  }

  unsubscribe(gameId: string, ws: Subscriber): void {
    this.subscriptions.get(gameId)?.delete(ws);
  }

  /**
   * Unsubscribe a socket from all games (on disconnect).
   */
  unsubscribeAll(ws: Subscriber): void {
    for (const subs of this.subscriptions.values()) {
      subs.delete(ws);
    }
  }

  subscriberCount(gameId: string): number {
    return this.subscriptions.get(gameId)?.size ?? 0;
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private startGame(game: ManagedGame, playerBoard: Board): void {
    const engine = new GameEngine({
      playerBoard,
      botBoard: game.botBoard,
      random: game.random,
    });
    const { gameId } = game;

    engine.on('round_complete', (round: RoundResult) => {
      this.broadcast(gameId, { type: 'round_complete', gameId, payload: round });
      this.emit('round_complete', { gameId, round });
    });

    engine.on('ship_sunk', (event: ShipSunkEvent) => {
      this.broadcast(gameId, { type: 'ship_sunk', gameId, payload: event });
      this.emit('ship_sunk', { gameId, ...event });
    });

    engine.on('game_over', (event: GameOverEvent) => {
      game.status = 'complete';
      game.completedAt = Date.now();
      this.broadcast(gameId, { type: 'game_over', gameId, payload: event });
      this.emit('game_complete', { gameId, ...event });
      this.broadcastGameState(game);
    });

    game.engine = engine;
    game.status = 'active';
    game.startedAt = Date.now();

    this.emit('game_started', { gameId });
    this.broadcastGameState(game);
  }

  private describe(game: ManagedGame): GameStatusResponse {
    const engine = game.engine;
    const playerBoard = engine ? engine.getPlayerBoard() : null;

    return {
      gameId: game.gameId,
      status: game.status,
      phase: engine ? engine.getPhase().kind : null,
      turn: engine ? engine.getTurn() : 0,
      winner: engine ? engine.getWinner() : null,
      remainingRoster: playerBoard ? playerBoard.remainingRoster() : game.fleet.remaining(),
      playerShipsAfloat: playerBoard
        ? playerBoard.floatingShipCount()
        : game.fleet.placedShips().length,
      botShipsAfloat: game.botBoard.floatingShipCount(),
      seed: game.status === 'complete' ? seedToHex(game.seed) : null,
      createdAt: game.createdAt,
      startedAt: game.startedAt,
      completedAt: game.completedAt,
    };
  }

  private gameStateMessage(game: ManagedGame): WSGameStateMessage {
    return { type: 'game_state', gameId: game.gameId, payload: this.describe(game) };
  }

  private broadcastGameState(game: ManagedGame): void {
    this.broadcast(game.gameId, this.gameStateMessage(game));
  }

  private broadcast(gameId: string, message: WSServerMessage): void {
    const subs = this.subscriptions.get(gameId);
    if (!subs) return;

    const data = JSON.stringify(message);
    for (const ws of subs) {
      if (ws.readyState === ws.OPEN) {
        ws.send(data);
      }
    }
  }
}

// =============================================================================
// Helpers
// =============================================================================

function sendToSocket(ws: Subscriber, message: WSServerMessage): void {
  if (ws.readyState === ws.OPEN) {
    ws.send(JSON.stringify(message));
  }
}

function failure(code: ManagerError['code'], message: string): { success: false; error: ManagerError } {
  return { success: false, error: { code, message } };
}

function notFound(): { success: false; error: ManagerError } {
  return failure('GAME_NOT_FOUND', 'Game not found');
}

/**
 * Runs a core operation, turning rule violations into a failed result.
 * Anything else propagates to the caller.
 */
function attempt<T>(action: () => T): ManagerResult<T> {
  try {
    return { success: true, value: action() };
  } catch (error) {
    if (isGameRuleError(error)) {
      return failure(error.code, error.message);
    }
    throw error;
  }
}
