import type { Rejection } from './errors';

// ============================================================================
// Card Types
// ============================================================================

export const COLORS = ['red', 'green', 'white', 'blue', 'yellow'] as const;
export type Color = (typeof COLORS)[number];

export const RANKS = [1, 2, 3, 4, 5] as const;
export type Rank = (typeof RANKS)[number];

export interface Card {
  id: number;   // Position in the unshuffled deck (0-49)
  color: Color;
  rank: Rank;
}

export type Clue =
  | { type: 'color'; color: Color }
  | { type: 'rank'; rank: Rank };

// ============================================================================
// Knowledge Types
// ============================================================================

export interface ClueRecord {
  giverSeat: number;
  turn: number;
  clue: Clue;
  matched: boolean; // Did this card match the clue?
}

// What a card's owner has been told about it. Only ever grows.
export interface KnowledgeRecord {
  colors: Color[];
  ranks: Rank[];
  notColors: Color[];
  notRanks: Rank[];
  clues: ClueRecord[];
}

export interface KnowledgeSummary {
  state: 'known' | 'partial' | 'unknown';
  color: Color | null;
  rank: Rank | null;
  possibleColors: Color[];
  possibleRanks: Rank[];
}

export interface HandSlot {
  card: Card;
  knowledge: KnowledgeRecord;
}

// ============================================================================
// Game State
// ============================================================================

export type GameStatus =
  | 'forming'      // Players seated, cards not dealt yet
  | 'inProgress'
  | 'won'          // All stacks reached 5
  | 'completed'    // Final lap ran out below a perfect score
  | 'lost'         // Third bomb
  | 'abandoned';   // Ended by a player

export type EndReason = 'won' | 'completed' | 'lost' | 'abandoned';

export type FinalLapStart =
  | 'lastDraw'   // Lap starts once the last card has been drawn
  | 'emptyDraw'; // Lap starts on the first play/discard that finds the deck empty

export interface RuleOptions {
  bonusClueOnStackCompletion: boolean;
  finalLapStart: FinalLapStart;
}

export type Stacks = Record<Color, Card[]>;

export interface GameState {
  id: string;
  createdAt: number;
  rules: RuleOptions;
  status: GameStatus;

  // Seat order is turn order
  players: string[];

  deck: Card[];                 // deck[0] is drawn next
  hands: HandSlot[][];          // hands[seat]
  discardPile: Card[];
  stacks: Stacks;

  clueTokens: number;
  bombTokens: number;

  currentSeat: number;
  turnNumber: number;           // Moves taken so far
  finalTurnsRemaining: number | null;

  endReason: EndReason | null;
}

// ============================================================================
// Game Events
// ============================================================================

export type GameEvent =
  | { type: 'gameFormed'; gameId: string; players: string[]; seatOrder: number[] }
  | { type: 'turnAdvanced'; gameId: string; player: string; seat: number; clueTokens: number; bombTokens: number; finalTurnsRemaining: number | null }
  | { type: 'cardPlayed'; gameId: string; player: string; slot: number; card: Card; success: boolean; drew: boolean }
  | { type: 'cardDiscarded'; gameId: string; player: string; slot: number; card: Card; drew: boolean }
  | { type: 'clueGiven'; gameId: string; giver: string; target: string; clue: Clue; affectedSlots: number[] }
  | { type: 'gameEnded'; gameId: string; reason: EndReason; score: number; players: string[]; endedBy?: string }
  | { type: 'gameBecameUnwinnable'; gameId: string; maxScore: number };

export type LobbyEvent =
  | { type: 'playerJoined'; player: string; waiting: string[] }
  | { type: 'playerLeft'; player: string; waiting: string[] }
  | { type: 'lobbyReady'; waiting: string[] }
  | { type: 'pinged'; from: string; target: string; gameId: string };

export type EngineEvent = GameEvent | LobbyEvent;

// ============================================================================
// Commands
// ============================================================================

export type Command =
  | { type: 'join' }
  | { type: 'leave' }
  | { type: 'start'; count?: number }
  | { type: 'quit' }
  | { type: 'play'; slot: number }
  | { type: 'discard'; slot: number }
  | { type: 'clue'; target: string; clue: Clue }
  | { type: 'hands' }
  | { type: 'discards' }
  | { type: 'deckCount' }
  | { type: 'ping' }
  | { type: 'clues'; target: string }
  | { type: 'players' };

// ============================================================================
// Player View (hides the observer's own cards)
// ============================================================================

export interface OwnSlotView {
  slot: number;
  knowledge: KnowledgeSummary;
}

export interface OtherSlotView {
  slot: number;
  card: Card;
  knowledge: KnowledgeSummary;
}

export interface OtherHandView {
  player: string;
  seat: number;
  slots: OtherSlotView[];
}

export interface PlayerView {
  gameId: string;
  status: GameStatus;
  you: string;
  mySeat: number;
  myHand: OwnSlotView[];
  otherHands: OtherHandView[];  // In turn order, starting after the observer
  stacks: Record<Color, number>; // Top rank per color, 0 when empty
  discardPile: Card[];
  deckCount: number;
  clueTokens: number;
  bombTokens: number;
  currentPlayer: string;
  isMyTurn: boolean;
  finalTurnsRemaining: number | null;
  score: number;
}

// ============================================================================
// Command Results
// ============================================================================

export interface GameSummary {
  gameId: string;
  players: string[];
  currentPlayer: string;
  score: number;
}

/**
 * Payload of an accepted command, beyond its events
 */
export type Reply =
  | { type: 'started'; gameId: string; players: string[] }
  | { type: 'hands'; view: PlayerView }
  | { type: 'discards'; discards: Record<Color, Rank[]> }
  | { type: 'deckCount'; deckCount: number }
  | { type: 'ping'; currentPlayer: string; isYourTurn: boolean }
  | { type: 'clues'; target: string; knowledge: KnowledgeSummary[] }
  | { type: 'players'; waiting: string[]; games: GameSummary[] };

export type CommandResult =
  | { ok: true; events: EngineEvent[]; reply?: Reply }
  | { ok: false; rejection: Rejection };
