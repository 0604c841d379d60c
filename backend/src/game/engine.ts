import { trackBall } from './ai';
import { bounceVelocity, integrate, intersects, movePaddle, nextSpeedMultiplier, reflectOffWalls } from './physics';
import { RandomSource, randomInt } from './random';
import { Ball, MatchConfig, MatchSnapshot, MatchState, PlayerInput, Rect, Side } from './types';

function centredBall(config: MatchConfig): Ball {
  return {
    x: Math.floor(config.width / 2 - config.ballSize / 2),
    y: Math.floor(config.height / 2 - config.ballSize / 2),
    width: config.ballSize,
    height: config.ballSize,
    vx: 0,
    vy: 0,
  };
}

function startingPaddles(config: MatchConfig): { player: Rect; ai: Rect } {
  const y = Math.floor(config.height / 2 - config.paddleHeight / 2);
  return {
    player: { x: config.paddleInset, y, width: config.paddleWidth, height: config.paddleHeight },
    ai: { x: config.width - config.paddleInset - config.paddleWidth, y, width: config.paddleWidth, height: config.paddleHeight },
  };
}

export function createMatch(config: MatchConfig): MatchState {
  return {
    tick: 0,
    status: 'IDLE',
    ball: centredBall(config),
    paddles: startingPaddles(config),
    score: { player: 0, ai: 0 },
    speedMultiplier: 1.0,
    winner: null,
  };
}

/**
 * Serve from the centre toward the opponent. Only valid while IDLE; any other
 * state is returned as is.
 */
export function startRally(state: MatchState, config: MatchConfig, rng: RandomSource): MatchState {
  if (state.status !== 'IDLE') return state;
  return {
    ...state,
    status: 'ACTIVE',
    ball: { ...state.ball, vx: config.ballSpeed, vy: randomInt(rng, -1, 2) },
  };
}

// Only leaves FINISHED. Calling it again from the resulting IDLE state is a no-op.
export function restartMatch(state: MatchState, config: MatchConfig): MatchState {
  if (state.status !== 'FINISHED') return state;
  return createMatch(config);
}

function resolvePaddleHit(ball: Ball, paddle: Rect, side: Side, multiplier: number, config: MatchConfig) {
  if (!intersects(paddle, ball)) {
    return { ball, multiplier };
  }
  const next = nextSpeedMultiplier(multiplier, config);
  return { ball: { ...ball, ...bounceVelocity(paddle, ball, side, next, config) }, multiplier: next };
}

function scorer(ball: Ball, config: MatchConfig): Side | null {
  if (ball.x < 0) return 'ai';
  if (ball.x > config.width) return 'player';
  return null;
}

/**
 * Advance an ACTIVE match by one fixed tick. Pure: `state` is left untouched and
 * a new record is returned. Non-active states are returned unchanged.
 */
export function stepMatch(state: MatchState, input: PlayerInput, config: MatchConfig, rng: RandomSource): MatchState {
  if (state.status !== 'ACTIVE') return state;

  let ball = reflectOffWalls(integrate(state.ball), config);

  let multiplier = state.speedMultiplier;
  ({ ball, multiplier } = resolvePaddleHit(ball, state.paddles.player, 'player', multiplier, config));
  ({ ball, multiplier } = resolvePaddleHit(ball, state.paddles.ai, 'ai', multiplier, config));

  const ai = trackBall(state.paddles.ai, ball, config, rng);
  const direction = (input.down ? 1 : 0) - (input.up ? 1 : 0);
  const player = movePaddle(state.paddles.player, direction * config.paddleSpeed, config);

  const next: MatchState = {
    ...state,
    tick: state.tick + 1,
    ball,
    paddles: { player, ai },
    speedMultiplier: multiplier,
  };

  const side = scorer(ball, config);
  if (!side) return next;

  const score = { ...next.score, [side]: next.score[side] + 1 };
  const won = score.player >= config.winningScore || score.ai >= config.winningScore;
  return {
    ...next,
    ball: centredBall(config),
    score,
    speedMultiplier: 1.0,
    status: won ? 'FINISHED' : 'IDLE',
    winner: won ? side : null,
  };
}

export function toSnapshot(state: MatchState): MatchSnapshot {
  const { ball } = state;
  return {
    tick: state.tick,
    state: state.status,
    playerPaddle: { ...state.paddles.player },
    aiPaddle: { ...state.paddles.ai },
    ball: { x: ball.x, y: ball.y, width: ball.width, height: ball.height },
    playerScore: state.score.player,
    aiScore: state.score.ai,
    winner: state.winner,
  };
}
