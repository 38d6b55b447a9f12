// Fleet Duel - Rule Errors

export type GameErrorCode =
  | 'INVALID_COORDINATE'
  | 'NOT_COLLINEAR'
  | 'INVALID_SHIP_SIZE'
  | 'ROSTER_EXHAUSTED'
  | 'OVERLAP'
  | 'ADJACENT_SHIPS'
  | 'ALREADY_FIRED'
  | 'OUT_OF_TURN'
  | 'GAME_OVER'
  | 'FLEET_INCOMPLETE'
  | 'INVALID_RECORD'
  | 'PLACEMENT_STALLED';

/**
 * Raised when an operation would break a game rule.
 * The state the operation targeted is always left unchanged.
 */
export class GameRuleError extends Error {
  readonly code: GameErrorCode;

  constructor(code: GameErrorCode, message: string) {
    super(message);
    this.name = 'GameRuleError';
    this.code = code;
  }

  /** PLACEMENT_STALLED is an internal fault; everything else can be retried */
  get isRecoverable(): boolean {
    return this.code !== 'PLACEMENT_STALLED';
  }
}

export function isGameRuleError(error: unknown): error is GameRuleError {
  return error instanceof GameRuleError;
}
