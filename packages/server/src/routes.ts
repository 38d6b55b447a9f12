// Fleet Duel - Express Routes

import { Router, Request, Response } from 'express';
import { seedFromHex } from '@fleet-duel/core';
import type { GameManager } from './game-manager.js';
import { renderBoard } from './board-renderer.js';
import {
  boardQuerySchema,
  createGameSchema,
  fireShotSchema,
  parseInput,
  placeShipSchema,
  shipsCsvQuerySchema,
} from './schemas.js';
import type {
  BoardResponse,
  CreateGameResponse,
  ErrorResponse,
  ManagerError,
  ShotResponse,
} from './types.js';

// =============================================================================
// Route Factory
// =============================================================================

export function createRoutes(gameManager: GameManager): Router {
  const router = Router();

  // ===========================================================================
  // Health Check
  // ===========================================================================

  router.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: Date.now(),
      uptime: process.uptime(),
    });
  });

  // ===========================================================================
  // Game Management
  // ===========================================================================

  /**
   * POST /games - Create a new game
   */
  router.post('/games', (req: Request, res: Response) => {
    const body = parseInput(createGameSchema, req.body ?? {});
    if (!body.success) {
      sendInvalidRequest(res, body.message);
      return;
    }

    const { gameId, seed, playerShipsCsv } = body.data;
    const result = gameManager.createGame({
      gameId,
      seed: seed === undefined ? undefined : seedFromHex(seed),
      playerShipsCsv,
    });

    if (!result.success) {
      sendManagerError(res, result.error);
      return;
    }

    const response: CreateGameResponse = {
      success: true,
      gameId: result.value.gameId,
      status: result.value.status,
    };
    res.status(201).json(response);
  });

  /**
   * GET /games - List games
   */
  router.get('/games', (_req: Request, res: Response) => {
    res.json({ games: gameManager.listGames() });
  });

  /**
   * GET /games/:gameId - Get game status
   */
  router.get('/games/:gameId', (req: Request, res: Response) => {
    const status = gameManager.getGameStatus(req.params.gameId);

    if (!status) {
      sendNotFound(res);
      return;
    }

    res.json(status);
  });

  /**
   * DELETE /games/:gameId - Remove a game
   */
  router.delete('/games/:gameId', (req: Request, res: Response) => {
    if (!gameManager.deleteGame(req.params.gameId)) {
      sendNotFound(res);
      return;
    }

    res.status(204).end();
  });

  // ===========================================================================
  // Play
  // ===========================================================================

  /**
   * POST /games/:gameId/ships - Place one ship of the human fleet
   */
  router.post('/games/:gameId/ships', (req: Request, res: Response) => {
    const body = parseInput(placeShipSchema, req.body);
    if (!body.success) {
      sendInvalidRequest(res, body.message);
      return;
    }

    const result = gameManager.placeShip(req.params.gameId, body.data.start, body.data.end);
    if (!result.success) {
      sendManagerError(res, result.error);
      return;
    }

    res.status(201).json(result.value);
  });

  /**
   * POST /games/:gameId/shots - Fire at the bot, then take the bot's reply
   */
  router.post('/games/:gameId/shots', (req: Request, res: Response) => {
    const body = parseInput(fireShotSchema, req.body);
    if (!body.success) {
      sendInvalidRequest(res, body.message);
      return;
    }

    const { gameId } = req.params;
    const result = gameManager.fireShot(gameId, body.data.target);
    if (!result.success) {
      sendManagerError(res, result.error);
      return;
    }

    const status = gameManager.getGameStatus(gameId);
    const playerBoard = gameManager.getBoardView(gameId, 'player');
    const botBoard = gameManager.getBoardView(gameId, 'bot');
    if (!status || !playerBoard || !botBoard) {
      sendNotFound(res);
      return;
    }

    const response: ShotResponse = {
      success: true,
      round: result.value,
      status: status.status,
      winner: status.winner,
      playerBoard,
      botBoard,
    };
    res.json(response);
  });

  // ===========================================================================
  // Boards and Exports
  // ===========================================================================

  /**
   * GET /games/:gameId/board?view=player|bot&format=json|text
   */
  router.get('/games/:gameId/board', (req: Request, res: Response) => {
    const query = parseInput(boardQuerySchema, req.query);
    if (!query.success) {
      sendInvalidRequest(res, query.message);
      return;
    }

    const { gameId } = req.params;
    const cells = gameManager.getBoardView(gameId, query.data.view);
    if (!cells) {
      sendNotFound(res);
      return;
    }

    if (query.data.format === 'text') {
      res.type('text/plain').send(renderBoard(cells));
      return;
    }

    const response: BoardResponse = { gameId, owner: query.data.view, cells };
    res.json(response);
  });

  /**
   * GET /games/:gameId/ships.csv?owner=player|bot
   */
  router.get('/games/:gameId/ships.csv', (req: Request, res: Response) => {
    const query = parseInput(shipsCsvQuerySchema, req.query);
    if (!query.success) {
      sendInvalidRequest(res, query.message);
      return;
    }

    const result = gameManager.getShipsCsv(req.params.gameId, query.data.owner);
    if (!result.success) {
      sendManagerError(res, result.error);
      return;
    }

    res.type('text/csv').send(result.value);
  });

  /**
   * GET /games/:gameId/moves.csv
   */
  router.get('/games/:gameId/moves.csv', (req: Request, res: Response) => {
    const result = gameManager.getMovesCsv(req.params.gameId);
    if (!result.success) {
      sendManagerError(res, result.error);
      return;
    }

    res.type('text/csv').send(result.value);
  });

  return router;
}

// =============================================================================
// Error Responses
// =============================================================================

export function statusForError(error: ManagerError): number {
  switch (error.code) {
    case 'GAME_NOT_FOUND':
      return 404;
    case 'GAME_EXISTS':
    case 'INVALID_STATE':
      return 409;
    case 'PLACEMENT_STALLED':
      return 500;
    default:
      return 400;
  }
}

function sendManagerError(res: Response, error: ManagerError): void {
  const body: ErrorResponse = { success: false, code: error.code, message: error.message };
  res.status(statusForError(error)).json(body);
}

function sendInvalidRequest(res: Response, message: string): void {
  const body: ErrorResponse = { success: false, code: 'INVALID_REQUEST', message };
  res.status(400).json(body);
}

function sendNotFound(res: Response): void {
  sendManagerError(res, { code: 'GAME_NOT_FOUND', message: 'Game not found' });
}
