// Deep Sea Adventure - Core Package

// Core types
export * from './types.js';

// Errors
export * from './errors.js';

// Randomness and dice
export * from './random.js';
export { Die } from './die.js';

// Board pieces
export { TreasureDeck, DEFAULT_TIERS, validateTiers } from './treasure-deck.js';
export { OxygenTrack } from './oxygen-track.js';
export { Diver } from './diver.js';

// Dive engine
export type {
  DiveEngineOptions,
  TreasureTakenEvent,
  DiverBankedEvent,
  DiverLostEvent,
} from './dive-engine.js';
export { DiveEngine } from './dive-engine.js';

// Game session
export type {
  GameSessionOptions,
  DecisionResult,
  DecisionRecord,
  DiverStanding,
  SessionOutcome,
  SessionStandings,
  DiveScoredEvent,
} from './game-session.js';
export { GameSession } from './game-session.js';

// Configuration
export type { SessionConfig, SessionConfigInput } from './config.js';
export {
  sessionConfigSchema,
  parseSessionConfig,
  loadSessionConfigFromEnv,
  loadSeedFromEnv,
} from './config.js';

// Logging
export type { ConsoleLoggerOptions } from './logger.js';
export { attachConsoleLogger, describeTurn } from './logger.js';
