// Fleet Duel - WebSocket Handler

import { WebSocket, WebSocketServer, type RawData } from 'ws';
import type { Server } from 'http';
import type { GameManager } from './game-manager.js';
import { clientMessageSchema, parseInput, type WSClientMessage } from './schemas.js';
import type { Subscriber, WSConnectedMessage, WSErrorMessage } from './types.js';

// =============================================================================
// WebSocket Setup
// =============================================================================

export function setupWebSocket(server: Server, gameManager: GameManager): WebSocketServer {
  const wss = new WebSocketServer({ server, path: '/ws' });

  wss.on('connection', (ws: WebSocket) => {
    console.log('WebSocket client connected');

    ws.on('message', (data: RawData) => {
      handleMessage(ws, data.toString(), gameManager);
    });

    ws.on('close', () => {
      console.log('WebSocket client disconnected');
      gameManager.unsubscribeAll(ws);
    });

    ws.on('error', (error) => {
      console.error('WebSocket error:', error);
      gameManager.unsubscribeAll(ws);
    });

    const welcome: WSConnectedMessage = {
      type: 'connected',
      payload: { message: 'Connected to Fleet Duel server' },
    };
    ws.send(JSON.stringify(welcome));
  });

  return wss;
}

// =============================================================================
// Message Handling
// =============================================================================

export function handleMessage(ws: Subscriber, raw: string, gameManager: GameManager): void {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    sendError(ws, 'PARSE_ERROR', 'Invalid JSON message');
    return;
  }

  const message = parseInput(clientMessageSchema, json);
  if (!message.success) {
    sendError(ws, 'INVALID_MESSAGE', message.message);
    return;
  }

  dispatch(ws, message.data, gameManager);
}

function dispatch(ws: Subscriber, message: WSClientMessage, gameManager: GameManager): void {
  const { type, gameId } = message;
  switch (type) {
    case 'subscribe':
      if (!gameManager.subscribe(gameId, ws)) {
        sendError(ws, 'GAME_NOT_FOUND', `Game ${gameId} not found`);
        return;
      }
      console.log(`Client subscribed to game ${gameId}`);
      break;

    case 'unsubscribe':
      gameManager.unsubscribe(gameId, ws);
      console.log(`Client unsubscribed from game ${gameId}`);
      break;
  }
}

function sendError(ws: Subscriber, code: string, message: string): void {
  const errorMsg: WSErrorMessage = {
    type: 'error',
    payload: { code, message },
  };

  if (ws.readyState === ws.OPEN) {
    ws.send(JSON.stringify(errorMsg));
  }
}
