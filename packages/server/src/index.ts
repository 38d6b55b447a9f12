// Fleet Duel - Server Entry Point
//
// Express + WebSocket server: one human against the bot per game.

import express, { Express } from 'express';
import { createServer, Server } from 'http';
import type { WebSocketServer } from 'ws';
import { GameManager, type GameManagerOptions } from './game-manager.js';
import { createRoutes } from './routes.js';
import { setupWebSocket } from './websocket.js';
import type { ErrorResponse } from './types.js';

// =============================================================================
// Configuration
// =============================================================================

const PORT = parseInt(process.env.PORT || '3001', 10);
const HOST = process.env.HOST || '0.0.0.0';

// =============================================================================
// Server Setup
// =============================================================================

export type CreateAppOptions = GameManagerOptions;

export function createApp(options: CreateAppOptions = {}): {
  app: Express;
  server: Server;
  gameManager: GameManager;
  wss: WebSocketServer;
} {
  const app = express();
  const server = createServer(app);
  const gameManager = new GameManager(options);

  // Middleware
  app.use(express.json());

  // CORS for development
  app.use((req, res, next) => {
    res.header('Access-Control-Allow-Origin', '*');
    res.header('Access-Control-Allow-Methods', 'GET, POST, DELETE, OPTIONS');
    res.header('Access-Control-Allow-Headers', 'Content-Type');
    if (req.method === 'OPTIONS') {
      res.sendStatus(200);
      return;
    }
    next();
  });

  // API routes
  app.use('/api', createRoutes(gameManager));

  // WebSocket
  const wss = setupWebSocket(server, gameManager);

  // Error handling
  app.use(
    (
      err: Error,
      _req: express.Request,
      res: express.Response,
      _next: express.NextFunction
    ) => {
      if (isBodyParseError(err)) {
        const body: ErrorResponse = {
          success: false,
          code: 'INVALID_REQUEST',
          message: 'Request body is not valid JSON',
        };
        res.status(400).json(body);
        return;
      }

      console.error('Server error:', err);
      const body: ErrorResponse = {
        success: false,
        code: 'INTERNAL_ERROR',
        message: 'Internal server error',
      };
      res.status(500).json(body);
    }
  );

  return { app, server, gameManager, wss };
}

/** Raised by express.json() for a body that does not parse */
function isBodyParseError(err: Error): boolean {
  return 'type' in err && err.type === 'entity.parse.failed';
}

// =============================================================================
// Start Server
// =============================================================================

if (process.env.NODE_ENV !== 'test') {
  const { server, gameManager } = createApp();

  server.listen(PORT, HOST, () => {
    console.log(`Fleet Duel server running at http://${HOST}:${PORT}`);
    console.log(`WebSocket available at ws://${HOST}:${PORT}/ws`);
  });

  // Graceful shutdown
  process.on('SIGINT', () => {
    console.log('\nShutting down...');
    server.close(() => {
      console.log('Server closed');
      process.exit(0);
    });
  });

  // Log game events
  gameManager.on('game_created', (e) => console.log('Game created:', e.gameId));
  gameManager.on('game_started', (e) => console.log(`Game ${e.gameId} started`));
  gameManager.on('ship_sunk', (e) =>
    console.log(`Game ${e.gameId}: ${e.shooter} sank a ship of size ${e.size}`)
  );
  gameManager.on('game_complete', (e) =>
    console.log(`Game ${e.gameId} complete! Winner: ${e.winner} after ${e.totalTurns} turns`)
  );
  gameManager.on('game_deleted', (e) => console.log('Game deleted:', e.gameId));
}

// Export for testing
export { GameManager } from './game-manager.js';
export type { GameManagerOptions, CreateGameOptions } from './game-manager.js';
export * from './types.js';
export { renderBoard, CELL_SYMBOLS } from './board-renderer.js';
export { handleMessage } from './websocket.js';
