export * from './game/types';
export { ConfigError } from './game/errors';
export { createMatchConfig, loadMatchConfigFromEnv } from './game/config';
export { createMatch, startRally, restartMatch, stepMatch, toSnapshot } from './game/engine';
export { BOUNCE_ANGLES, bounceBand, bounceVelocity, intersects } from './game/physics';
export { AI_PROFILES, trackBall } from './game/ai';
export type { AIProfile } from './game/ai';
export { createSeededRandom, systemRandom, randomInt } from './game/random';
export type { RandomSource } from './game/random';
export { FixedStepLoop } from './game/loop';
export type { FixedStepLoopOptions } from './game/loop';
export { MatchSession } from './game/MatchSession';
export type { MatchSessionEvents, MatchSessionOptions } from './game/MatchSession';
export { logger, createLogger } from './utils/logger';
export type { Logger } from './utils/logger';
