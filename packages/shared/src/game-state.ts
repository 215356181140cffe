import type {
  Card,
  Clue,
  EndReason,
  GameEvent,
  GameState,
  HandSlot,
  KnowledgeSummary,
  PlayerView,
  RuleOptions,
} from './types';
import { COLORS, RANKS } from './types';
import {
  DEFAULT_RULES,
  MAX_BOMB_TOKENS,
  MAX_CLUE_TOKENS,
  MAX_PLAYERS,
  MAX_RANK,
  MIN_PLAYERS,
  PERFECT_SCORE,
} from './constants';
import { ConfigurationError, IllegalMoveError } from './errors';
import { buildDeck, shuffleDeck, dealCards } from './cards';
import { applyClue, clueMatches, createKnowledge, summarizeKnowledge } from './knowledge';
import {
  addToStack,
  allStacksComplete,
  assertCanAct,
  canClue,
  canDiscard,
  createStacks,
  getNextSeat,
  getSlot,
  getStackTops,
  isPlayable,
} from './rules';
import { getMaxAchievableScore, getScore } from './scoring';
import type { RandomSource } from './random';

export interface MoveResult {
  game: GameState;
  events: GameEvent[];
}

// ============================================================================
// Game Creation
// ============================================================================

/**
 * Create a new game in the forming state. Seats follow the order of `players`;
 * the caller owns id allocation.
 */
export function createGame(
  players: string[],
  options: { id: string; rules?: Partial<RuleOptions>; now?: number }
): GameState {
  if (players.length < MIN_PLAYERS || players.length > MAX_PLAYERS) {
    throw new ConfigurationError(
      'invalidPlayerCount',
      `Hanabi needs ${MIN_PLAYERS} to ${MAX_PLAYERS} players, got ${players.length}`
    );
  }

  if (new Set(players).size !== players.length) {
    throw new ConfigurationError('duplicatePlayer', 'A player cannot take two seats');
  }

  return {
    id: options.id,
    createdAt: options.now ?? Date.now(),
    rules: { ...DEFAULT_RULES, ...options.rules },
    status: 'forming',
    players: [...players],
    deck: [],
    hands: players.map(() => []),
    discardPile: [],
    stacks: createStacks(),
    clueTokens: MAX_CLUE_TOKENS,
    bombTokens: 0,
    currentSeat: 0,
    turnNumber: 0,
    finalTurnsRemaining: null,
    endReason: null,
  };
}

// ============================================================================
// Game Start
// ============================================================================

/**
 * Shuffle, deal and hand the first turn to seat 0
 */
export function startGame(
  game: GameState,
  random: RandomSource = Math.random,
  deck: Card[] = shuffleDeck(buildDeck(), random)
): MoveResult {
  if (game.status !== 'forming') {
    throw new ConfigurationError('alreadyStarted', 'Game already started');
  }

  const { hands, remainingDeck } = dealCards(deck, game.players.length);

  const started: GameState = {
    ...game,
    status: 'inProgress',
    deck: remainingDeck,
    hands,
    discardPile: [],
    stacks: createStacks(),
    clueTokens: MAX_CLUE_TOKENS,
    bombTokens: 0,
    currentSeat: 0,
    turnNumber: 0,
    finalTurnsRemaining: null,
  };

  return {
    game: started,
    events: [
      {
        type: 'gameFormed',
        gameId: game.id,
        players: [...game.players],
        seatOrder: game.players.map((_, seat) => seat),
      },
      turnAdvancedEvent(started),
    ],
  };
}

// ============================================================================
// Helpers
// ============================================================================

function getHand(game: GameState, seat: number): HandSlot[] {
  const hand = game.hands[seat];
  if (!hand) {
    throw new IllegalMoveError('noSuchPlayer', 'That player is not in this game');
  }
  return hand;
}

function getPlayerName(game: GameState, seat: number): string {
  return game.players[seat] ?? `seat ${seat}`;
}

export function getPlayerSeat(game: GameState, player: string): number {
  return game.players.indexOf(player);
}

function replaceHand(hands: HandSlot[][], seat: number, hand: HandSlot[]): HandSlot[][] {
  return hands.map((h, i) => (i === seat ? hand : h));
}

/**
 * Take the card at `slot` out of the hand and append a fresh card from the
 * front of the deck at the right end, if there is one
 */
function takeAndDraw(
  hand: HandSlot[],
  slot: number,
  deck: Card[]
): { hand: HandSlot[]; deck: Card[]; drew: boolean } {
  const remaining = hand.filter((_, i) => i !== slot - 1);
  const [next, ...rest] = deck;
  if (!next) {
    return { hand: remaining, deck, drew: false };
  }
  return {
    hand: [...remaining, { card: next, knowledge: createKnowledge() }],
    deck: rest,
    drew: true,
  };
}

function turnAdvancedEvent(game: GameState): GameEvent {
  return {
    type: 'turnAdvanced',
    gameId: game.id,
    player: getPlayerName(game, game.currentSeat),
    seat: game.currentSeat,
    clueTokens: game.clueTokens,
    bombTokens: game.bombTokens,
    finalTurnsRemaining: game.finalTurnsRemaining,
  };
}

function endGame(game: GameState, reason: EndReason, endedBy?: string): MoveResult {
  const ended: GameState = { ...game, status: reason, endReason: reason };
  const event: Extract<GameEvent, { type: 'gameEnded' }> = {
    type: 'gameEnded',
    gameId: game.id,
    reason,
    score: getScore(ended),
    players: [...game.players],
  };
  if (endedBy !== undefined) event.endedBy = endedBy;
  return { game: ended, events: [event] };
}

/**
 * Count down the final lap. Returns the counter after the move just made.
 */
function nextFinalTurns(before: GameState, after: GameState, drewFromEmptyDeck: boolean): number | null {
  if (before.finalTurnsRemaining !== null) {
    return before.finalTurnsRemaining - 1;
  }

  const numPlayers = before.players.length;
  if (before.rules.finalLapStart === 'lastDraw') {
    // The move that drew the last card starts a lap of one more turn per player
    return before.deck.length > 0 && after.deck.length === 0 ? numPlayers : null;
  }

  // emptyDraw: the move that found the deck empty is the first turn of the lap
  return drewFromEmptyDeck ? numPlayers - 1 : null;
}

/**
 * Shared tail of every move: check for an ending, otherwise pass the turn on
 */
function completeMove(
  before: GameState,
  after: GameState,
  events: GameEvent[],
  drewFromEmptyDeck: boolean
): MoveResult {
  const finalTurnsRemaining = nextFinalTurns(before, after, drewFromEmptyDeck);
  const moved: GameState = {
    ...after,
    turnNumber: before.turnNumber + 1,
    finalTurnsRemaining,
  };

  if (moved.bombTokens >= MAX_BOMB_TOKENS) {
    const ended = endGame(moved, 'lost');
    return { game: ended.game, events: [...events, ...ended.events] };
  }

  if (allStacksComplete(moved.stacks)) {
    const ended = endGame(moved, 'won');
    return { game: ended.game, events: [...events, ...ended.events] };
  }

  if (finalTurnsRemaining !== null && finalTurnsRemaining <= 0) {
    const reason: EndReason = getScore(moved) === PERFECT_SCORE ? 'won' : 'completed';
    const ended = endGame(moved, reason);
    return { game: ended.game, events: [...events, ...ended.events] };
  }

  const advanced: GameState = {
    ...moved,
    currentSeat: getNextSeat(before.currentSeat, before.players.length),
  };

  return { game: advanced, events: [...events, turnAdvancedEvent(advanced)] };
}

function unwinnableEvents(before: GameState, after: GameState): GameEvent[] {
  const maxBefore = getMaxAchievableScore(before);
  const maxAfter = getMaxAchievableScore(after);
  if (maxBefore === PERFECT_SCORE && maxAfter < PERFECT_SCORE) {
    return [{ type: 'gameBecameUnwinnable', gameId: after.id, maxScore: maxAfter }];
  }
  return [];
}

// ============================================================================
// Moves
// ============================================================================

/**
 * Play the card at `slot` (1-based, from the left).
 *
 * A card one above its stack's top is added to the stack; anything else is
 * discarded and costs a bomb token.
 */
export function playCard(game: GameState, seat: number, slot: number): MoveResult {
  assertCanAct(game, seat);
  const hand = getHand(game, seat);
  const { card } = getSlot(hand, slot);

  const drawn = takeAndDraw(hand, slot, game.deck);
  const success = isPlayable(game.stacks, card);

  let clueTokens = game.clueTokens;
  if (
    success &&
    card.rank === MAX_RANK &&
    game.rules.bonusClueOnStackCompletion &&
    clueTokens < MAX_CLUE_TOKENS
  ) {
    clueTokens++;
  }

  const after: GameState = {
    ...game,
    deck: drawn.deck,
    hands: replaceHand(game.hands, seat, drawn.hand),
    stacks: success ? addToStack(game.stacks, card) : game.stacks,
    discardPile: success ? game.discardPile : [...game.discardPile, card],
    bombTokens: success ? game.bombTokens : game.bombTokens + 1,
    clueTokens,
  };

  const events: GameEvent[] = [
    {
      type: 'cardPlayed',
      gameId: game.id,
      player: getPlayerName(game, seat),
      slot,
      card,
      success,
      drew: drawn.drew,
    },
    ...unwinnableEvents(game, after),
  ];

  return completeMove(game, after, events, !drawn.drew);
}

/**
 * Discard the card at `slot` to regain a clue token.
 * Not allowed while all clue tokens are available.
 */
export function discardCard(game: GameState, seat: number, slot: number): MoveResult {
  assertCanAct(game, seat);

  if (!canDiscard(game)) {
    throw new IllegalMoveError(
      'maxClues',
      `All ${MAX_CLUE_TOKENS} clue tokens are available, so discarding is not allowed`
    );
  }

  const hand = getHand(game, seat);
  const { card } = getSlot(hand, slot);
  const drawn = takeAndDraw(hand, slot, game.deck);

  const after: GameState = {
    ...game,
    deck: drawn.deck,
    hands: replaceHand(game.hands, seat, drawn.hand),
    discardPile: [...game.discardPile, card],
    clueTokens: game.clueTokens + 1,
  };

  const events: GameEvent[] = [
    {
      type: 'cardDiscarded',
      gameId: game.id,
      player: getPlayerName(game, seat),
      slot,
      card,
      drew: drawn.drew,
    },
    ...unwinnableEvents(game, after),
  ];

  return completeMove(game, after, events, !drawn.drew);
}

/**
 * Tell `target` which of their cards match a color or rank
 */
export function giveClue(game: GameState, seat: number, target: string, clue: Clue): MoveResult {
  assertCanAct(game, seat);

  const targetSeat = getPlayerSeat(game, target);
  if (targetSeat === -1) {
    throw new IllegalMoveError('noSuchPlayer', `There is no player in this game named ${target}`);
  }

  if (targetSeat === seat) {
    throw new IllegalMoveError('clueToSelf', 'You cannot give a clue to yourself');
  }

  if (!canClue(game)) {
    throw new IllegalMoveError('notEnoughClues', 'There are no clue tokens left, so you cannot clue');
  }

  const { hand, affectedSlots } = applyClue(getHand(game, targetSeat), clue, seat, game.turnNumber);

  const after: GameState = {
    ...game,
    hands: replaceHand(game.hands, targetSeat, hand),
    clueTokens: game.clueTokens - 1,
  };

  const events: GameEvent[] = [
    {
      type: 'clueGiven',
      gameId: game.id,
      giver: getPlayerName(game, seat),
      target,
      clue,
      affectedSlots,
    },
  ];

  return completeMove(game, after, events, false);
}

// ============================================================================
// Game End
// ============================================================================

/**
 * End the game early
 */
export function abandonGame(game: GameState, byPlayer?: string): MoveResult {
  if (game.status !== 'forming' && game.status !== 'inProgress') {
    throw new IllegalMoveError('gameNotInProgress', 'The game has already ended');
  }
  return endGame(game, 'abandoned', byPlayer);
}

// ============================================================================
// Player View (hides the observer's own cards)
// ============================================================================

/**
 * Project the full state onto what `observerSeat` may see.
 * The observer gets only knowledge summaries for their own hand.
 */
export function getPlayerView(game: GameState, observerSeat: number): PlayerView {
  const myHand = getHand(game, observerSeat);
  const numPlayers = game.players.length;

  const otherHands: PlayerView['otherHands'] = [];
  for (let offset = 1; offset < numPlayers; offset++) {
    const seat = (observerSeat + offset) % numPlayers;
    otherHands.push({
      player: getPlayerName(game, seat),
      seat,
      slots: getHand(game, seat).map((slot, i) => ({
        slot: i + 1,
        card: slot.card,
        knowledge: summarizeKnowledge(slot.knowledge),
      })),
    });
  }

  return {
    gameId: game.id,
    status: game.status,
    you: getPlayerName(game, observerSeat),
    mySeat: observerSeat,
    myHand: myHand.map((slot, i) => ({ slot: i + 1, knowledge: summarizeKnowledge(slot.knowledge) })),
    otherHands,
    stacks: getStackTops(game.stacks),
    discardPile: [...game.discardPile],
    deckCount: game.deck.length,
    clueTokens: game.clueTokens,
    bombTokens: game.bombTokens,
    currentPlayer: getPlayerName(game, game.currentSeat),
    isMyTurn: isPlayersTurn(game, observerSeat),
    finalTurnsRemaining: game.finalTurnsRemaining,
    score: getScore(game),
  };
}

/**
 * Everything `target` has been told about their hand. Public to the whole table.
 */
export function getPublicKnowledge(game: GameState, target: string): KnowledgeSummary[] {
  const seat = getPlayerSeat(game, target);
  if (seat === -1) {
    throw new IllegalMoveError('noSuchPlayer', `There is no player in this game named ${target}`);
  }
  return getHand(game, seat).map((slot) => summarizeKnowledge(slot.knowledge));
}

// ============================================================================
// State Queries
// ============================================================================

/**
 * Check if it's a specific seat's turn
 */
export function isPlayersTurn(game: GameState, seat: number): boolean {
  return game.status === 'inProgress' && game.currentSeat === seat;
}

/**
 * Moves available to the active seat: slots to play or discard, and every
 * informative clue per teammate
 */
export function getValidActions(game: GameState): {
  play: number[];
  discard: number[];
  clues: { target: string; clue: Clue }[];
} {
  if (game.status !== 'inProgress') {
    return { play: [], discard: [], clues: [] };
  }

  const seat = game.currentSeat;
  const slots = getHand(game, seat).map((_, i) => i + 1);
  const clues: { target: string; clue: Clue }[] = [];

  if (canClue(game)) {
    game.players.forEach((target, targetSeat) => {
      if (targetSeat === seat) return;
      const hand = getHand(game, targetSeat);
      const options: Clue[] = [
        ...COLORS.map((color): Clue => ({ type: 'color', color })),
        ...RANKS.map((rank): Clue => ({ type: 'rank', rank })),
      ];
      for (const clue of options) {
        if (hand.some((slot) => clueMatches(slot.card, clue))) {
          clues.push({ target, clue });
        }
      }
    });
  }

  return {
    play: slots,
    discard: canDiscard(game) ? slots : [],
    clues,
  };
}
