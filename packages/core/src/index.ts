// Fleet Duel - Core Package

// Core types
export * from './types.js';
export * from './errors.js';

// Coordinates and placement rules
export * from './coordinates.js';
export * from './placement.js';

// Boards and fleets
export { Board } from './board.js';
export type { ShotLogEntry } from './board.js';
export * from './fleet-builder.js';
export * from './random.js';

// Game engine
export type {
  GameEngineConfig,
  ShipSunkEvent,
  GameOverEvent,
  SerializedGame,
} from './game-engine.js';
export { GameEngine } from './game-engine.js';

// CSV and snapshot shapes
export * from './persistence.js';
