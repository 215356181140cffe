// Types
export * from './types.js';

// Constants
export * from './constants.js';

// Error taxonomy
export * from './errors.js';

// Seedable shuffling
export * from './random.js';

// Card & deck utilities
export * from './cards.js';

// Knowledge model
export * from './knowledge.js';

// Rules
export * from './rules.js';

// Scoring
export * from './scoring.js';

// Game state machine
export * from './game-state.js';
