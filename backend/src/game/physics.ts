import { Ball, MatchConfig, Rect, Side } from './types';

// Degrees, indexed by the paddle band the ball centre lands in (top to bottom).
export const BOUNCE_ANGLES = [-60, -30, 0, 30, 60] as const;

const BAND_COUNT = BOUNCE_ANGLES.length;

// Velocities stay whole pixels per tick; `|| 0` drops the -0 that trunc yields.
const toWholePixels = (value: number) => Math.trunc(value) || 0;

export const centreY = (rect: Rect) => rect.y + Math.floor(rect.height / 2);

export function clampPaddleY(y: number, config: MatchConfig): number {
  const maxY = config.height - config.paddleHeight;
  return Math.max(0, Math.min(maxY, y));
}

export function movePaddle(paddle: Rect, dy: number, config: MatchConfig): Rect {
  if (dy === 0) return paddle;
  return { ...paddle, y: clampPaddleY(paddle.y + dy, config) };
}

export function intersects(a: Rect, b: Rect): boolean {
  return a.x < b.x + b.width && a.x + a.width > b.x && a.y < b.y + b.height && a.y + a.height > b.y;
}

export function integrate(ball: Ball): Ball {
  return { ...ball, x: ball.x + ball.vx, y: ball.y + ball.vy };
}

// Top/bottom walls. vy always ends up pointing back into the arena and the ball is
// clamped inside it.
export function reflectOffWalls(ball: Ball, config: MatchConfig): Ball {
  if (ball.y <= 0) {
    return { ...ball, y: 0, vy: Math.abs(ball.vy) };
  }
  const maxY = config.height - ball.height;
  if (ball.y >= maxY) {
    return { ...ball, y: maxY, vy: -Math.abs(ball.vy) };
  }
  return ball;
}

export function bounceBand(paddle: Rect, ball: Rect): number {
  const relativeY = centreY(ball) - centreY(paddle);
  const bandHeight = Math.max(1, Math.floor(paddle.height / BAND_COUNT));
  const band = Math.floor((relativeY + Math.floor(paddle.height / 2)) / bandHeight);
  return Math.max(0, Math.min(BAND_COUNT - 1, band));
}

export function nextSpeedMultiplier(multiplier: number, config: MatchConfig): number {
  return Math.min(multiplier + config.speedIncrement, config.maxSpeedMultiplier);
}

/**
 * Velocity after a paddle hit: base speed scaled by the multiplier, rotated by the
 * angle of the band that was hit, horizontal component pointing away from `side`.
 */
export function bounceVelocity(
  paddle: Rect,
  ball: Ball,
  side: Side,
  multiplier: number,
  config: MatchConfig,
): { vx: number; vy: number } {
  const angle = (BOUNCE_ANGLES[bounceBand(paddle, ball)] * Math.PI) / 180;
  const speed = config.ballSpeed * multiplier;
  const vx = Math.abs(toWholePixels(speed * Math.cos(angle)));
  return {
    vx: side === 'player' ? vx : 0 - vx,
    vy: toWholePixels(speed * Math.sin(angle)),
  };
}
