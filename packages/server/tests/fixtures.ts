import { formatCoordinate, type CellView } from '@fleet-duel/core';
import type { GameManager } from '../src/game-manager.js';
import type { Subscriber, WSServerMessage } from '../src/types.js';

// =============================================================================
// Shared Fixtures
// =============================================================================

export const TEST_SEED_HEX = '5eed'.repeat(16);

/** A complete fleet on rows A, C, E and G */
export const FIXED_FLEET_CSV = [
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

/**
 * In-process stand-in for a WebSocket connection.
 */
export class FakeSocket implements Subscriber {
  readonly OPEN = 1;
  readyState = 1;
  readonly sent: string[] = [];

  send(data: string): void {
    this.sent.push(data);
  }

  messages(): WSServerMessage[] {
    return this.sent.map(data => JSON.parse(data));
  }

  types(): string[] {
    return this.messages().map(message => message.type);
  }
}

/** First cell of the bot board the human has not learned anything about */
export function firstUnknownCell(cells: readonly (readonly CellView[])[]): string {
  for (let row = 0; row < cells.length; row++) {
    const col = cells[row].indexOf('unknown');
    if (col >= 0) {
      return formatCoordinate({ row, col });
    }
  }
  throw new Error('No unknown cells left');
}

/**
 * Sweeps the bot board in row-major order until the game ends.
 * Returns the number of rounds played.
 */
export function playUntilOver(manager: GameManager, gameId: string): number {
  let rounds = 0;
  while (manager.getGameStatus(gameId)?.status === 'active') {
    const view = manager.getBoardView(gameId, 'bot');
    if (!view) {
      throw new Error(`Game ${gameId} disappeared`);
    }
    const result = manager.fireShot(gameId, firstUnknownCell(view));
    if (!result.success) {
      throw new Error(result.error.message);
    }
    rounds++;
  }
  return rounds;
}
