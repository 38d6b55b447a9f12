// Fleet Duel - Server Types

import type {
  Board,
  CellView,
  EnginePhase,
  FleetBuilder,
  GameEngine,
  GameErrorCode,
  GameOverEvent,
  PlayerSide,
  RandomSource,
  RosterCount,
  RoundResult,
  ShipSnapshot,
  ShipSunkEvent,
} from '@fleet-duel/core';

// =============================================================================
// Game Types
// =============================================================================

export type GameStatus = 'setup' | 'active' | 'complete';

export interface ManagedGame {
  gameId: string;
  status: GameStatus;
  seed: Uint8Array;
  random: RandomSource;
  /** Collects the human's placements until the roster is complete */
  fleet: FleetBuilder;
  botBoard: Board;
  engine: GameEngine | null;
  createdAt: number;
  startedAt: number | null;
  completedAt: number | null;
}

/**
 * Anything the manager can push JSON to. `ws` sockets satisfy it.
 */
export interface Subscriber {
  readonly readyState: number;
  readonly OPEN: number;
  send(data: string): void;
}

export type ManagerErrorCode =
  | GameErrorCode
  | 'GAME_NOT_FOUND'
  | 'GAME_EXISTS'
  | 'INVALID_STATE';

export interface ManagerError {
  code: ManagerErrorCode;
  message: string;
}

export type ManagerResult<T> =
  | { success: true; value: T }
  | { success: false; error: ManagerError };

// =============================================================================
// API Request/Response Types
// =============================================================================

export interface CreateGameResponse {
  success: true;
  gameId: string;
  status: GameStatus;
}

export interface GameStatusResponse {
  gameId: string;
  status: GameStatus;
  phase: EnginePhase['kind'] | null;
  turn: number;
  winner: PlayerSide | null;
  remainingRoster: RosterCount;
  playerShipsAfloat: number;
  botShipsAfloat: number;
  /** Hex seed, revealed once the game is over */
  seed: string | null;
  createdAt: number;
  startedAt: number | null;
  completedAt: number | null;
}

export interface PlaceShipResponse {
  success: true;
  ship: ShipSnapshot;
  remaining: RosterCount;
  status: GameStatus;
}

export interface ShotResponse {
  success: true;
  round: RoundResult;
  status: GameStatus;
  winner: PlayerSide | null;
  playerBoard: CellView[][];
  botBoard: CellView[][];
}

export interface BoardResponse {
  gameId: string;
  owner: PlayerSide;
  cells: CellView[][];
}

export interface ErrorResponse {
  success: false;
  code: ManagerErrorCode | 'INVALID_REQUEST' | 'INTERNAL_ERROR';
  message: string;
}

// =============================================================================
// WebSocket Message Types
// =============================================================================

export interface WSConnectedMessage {
  type: 'connected';
  payload: { message: string };
}

export interface WSGameStateMessage {
  type: 'game_state';
  gameId: string;
  payload: GameStatusResponse;
}

export interface WSRoundCompleteMessage {
  type: 'round_complete';
  gameId: string;
  payload: RoundResult;
}

export interface WSShipSunkMessage {
  type: 'ship_sunk';
  gameId: string;
  payload: ShipSunkEvent;
}

export interface WSGameOverMessage {
  type: 'game_over';
  gameId: string;
  payload: GameOverEvent;
}

export interface WSErrorMessage {
  type: 'error';
  payload: {
    code: string;
    message: string;
  };
}

export type WSServerMessage =
  | WSConnectedMessage
  | WSGameStateMessage
  | WSRoundCompleteMessage
  | WSShipSunkMessage
  | WSGameOverMessage
  | WSErrorMessage;
