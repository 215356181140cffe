// ============================================================================
// Error Taxonomy
// ============================================================================

export type ConfigurationReason =
  | 'invalidPlayerCount'
  | 'duplicatePlayer'
  | 'deckTooSmall'
  | 'alreadyStarted';

export type IllegalMoveReason =
  | 'gameNotInProgress'
  | 'notYourTurn'
  | 'noSuchCard'
  | 'noSuchPlayer'
  | 'clueToSelf'
  | 'noMatchingCards'
  | 'notEnoughClues'
  | 'maxClues';

export type LobbyReason =
  | 'alreadyInGame'
  | 'notWaiting'
  | 'notEnoughPlayers'
  | 'invalidPlayerCount'
  | 'notInGame';

export type RejectionKind = 'configuration' | 'illegalMove' | 'lobby';

export interface Rejection {
  kind: RejectionKind;
  reason: ConfigurationReason | IllegalMoveReason | LobbyReason;
  message: string;
}

/**
 * Invalid setup, e.g. dealing to a table of the wrong size.
 * Fatal to forming that game, never to the process.
 */
export class ConfigurationError extends Error {
  readonly kind = 'configuration' as const;

  constructor(readonly reason: ConfigurationReason, message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * A move the rules do not allow right now. Always reported to the actor,
 * and the game state is left untouched.
 */
export class IllegalMoveError extends Error {
  readonly kind = 'illegalMove' as const;

  constructor(readonly reason: IllegalMoveReason, message: string) {
    super(message);
    this.name = 'IllegalMoveError';
  }
}

export class LobbyError extends Error {
  readonly kind = 'lobby' as const;

  constructor(readonly reason: LobbyReason, message: string) {
    super(message);
    this.name = 'LobbyError';
  }
}

export type EngineError = ConfigurationError | IllegalMoveError | LobbyError;

export function isEngineError(error: unknown): error is EngineError {
  return (
    error instanceof ConfigurationError ||
    error instanceof IllegalMoveError ||
    error instanceof LobbyError
  );
}

/**
 * Convert an engine error into the structured reason handed to the transport.
 * Returns null for anything that is not an engine error.
 */
export function toRejection(error: unknown): Rejection | null {
  if (!isEngineError(error)) return null;
  return { kind: error.kind, reason: error.reason, message: error.message };
}
