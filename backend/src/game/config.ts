import { z } from 'zod';
import { ConfigError } from './errors';
import { AIDifficulty, DEFAULT_CONFIG, MatchConfig } from './types';

const DIFFICULTY_VALUES = ['EASY', 'NORMAL', 'HARD'] as const satisfies readonly AIDifficulty[];

const positiveInt = z.number().int().positive();

const matchConfigSchema = z
  .object({
    width: positiveInt,
    height: positiveInt,
    paddleWidth: positiveInt,
    paddleHeight: positiveInt,
    paddleInset: z.number().int().min(0),
    ballSize: positiveInt,
    paddleSpeed: positiveInt,
    ballSpeed: positiveInt,
    winningScore: z.number().int().min(1),
    speedIncrement: z.number().gt(0).max(1),
    maxSpeedMultiplier: z.number().min(1).max(3),
    aiDifficulty: z.enum(DIFFICULTY_VALUES),
  })
  .superRefine((cfg, ctx) => {
    if (cfg.paddleHeight >= cfg.height) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['paddleHeight'], message: 'must be smaller than height' });
    }
    if (cfg.ballSize >= cfg.height) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['ballSize'], message: 'must be smaller than height' });
    }
    if (2 * (cfg.paddleInset + cfg.paddleWidth) >= cfg.width) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['paddleInset'], message: 'paddles do not fit inside width' });
    }
  });

const envSchema = z.object({
  RALLY_WIDTH: z.coerce.number().optional(),
  RALLY_HEIGHT: z.coerce.number().optional(),
  RALLY_PADDLE_HEIGHT: z.coerce.number().optional(),
  RALLY_PADDLE_SPEED: z.coerce.number().optional(),
  RALLY_BALL_SPEED: z.coerce.number().optional(),
  RALLY_WINNING_SCORE: z.coerce.number().optional(),
  RALLY_AI_DIFFICULTY: z.string().trim().toUpperCase().optional(),
});

const formatIssues = (error: z.ZodError): string[] =>
  error.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message));

const validate = (candidate: object): Readonly<MatchConfig> => {
  const defined = Object.fromEntries(Object.entries(candidate).filter(([, value]) => value !== undefined));
  const parsed = matchConfigSchema.safeParse({ ...DEFAULT_CONFIG, ...defined });
  if (!parsed.success) {
    throw new ConfigError(formatIssues(parsed.error));
  }
  return Object.freeze(parsed.data);
};

/**
 * Merge overrides into the defaults and validate the result.
 * Throws ConfigError when any dimension, speed or threshold is unusable.
 */
export function createMatchConfig(overrides: Partial<MatchConfig> = {}): Readonly<MatchConfig> {
  return validate({ ...overrides });
}

export function loadMatchConfigFromEnv(env: NodeJS.ProcessEnv = process.env): Readonly<MatchConfig> {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(formatIssues(parsed.error));
  }
  const vars = parsed.data;
  return validate({
    width: vars.RALLY_WIDTH,
    height: vars.RALLY_HEIGHT,
    paddleHeight: vars.RALLY_PADDLE_HEIGHT,
    paddleSpeed: vars.RALLY_PADDLE_SPEED,
    ballSpeed: vars.RALLY_BALL_SPEED,
    winningScore: vars.RALLY_WINNING_SCORE,
    aiDifficulty: vars.RALLY_AI_DIFFICULTY,
  });
}
