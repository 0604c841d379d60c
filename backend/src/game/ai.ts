import { centreY, movePaddle } from './physics';
import { RandomSource, randomInt } from './random';
import { AIDifficulty, MatchConfig, Rect } from './types';

export interface AIProfile {
  noise: number; // max aim error in pixels, either direction
  deadZone: number; // no movement while the paddle centre is this close to the target
}

export const AI_PROFILES: Record<AIDifficulty, AIProfile> = {
  EASY: { noise: 40, deadZone: 25 },
  NORMAL: { noise: 20, deadZone: 15 },
  HARD: { noise: 8, deadZone: 6 },
};

// Aim at the ball centre, off by a random amount each tick.
export function aimAt(ball: Rect, profile: AIProfile, rng: RandomSource): number {
  return centreY(ball) + randomInt(rng, -profile.noise, profile.noise);
}

/**
 * One tick of opponent movement: a fixed step toward a noisy target, nothing while
 * inside the dead zone. Imperfect tracking on purpose.
 */
export function trackBall(paddle: Rect, ball: Rect, config: MatchConfig, rng: RandomSource): Rect {
  const profile = AI_PROFILES[config.aiDifficulty];
  const targetY = aimAt(ball, profile, rng);
  const paddleCentre = centreY(paddle);

  if (paddleCentre < targetY - profile.deadZone) {
    return movePaddle(paddle, config.paddleSpeed, config);
  }
  if (paddleCentre > targetY + profile.deadZone) {
    return movePaddle(paddle, -config.paddleSpeed, config);
  }
  return paddle;
}
