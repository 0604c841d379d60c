import { z } from 'zod';
import { ConfigError } from './errors';

export const DEFAULT_STEP_MS = 1000 / 60;
export const DEFAULT_MAX_FRAME_MS = 250;
export const DEFAULT_MAX_STEPS_PER_FRAME = 8;

export interface FixedStepLoopOptions {
  stepMs?: number;
  maxFrameMs?: number; // longer gaps (suspended tab, debugger) are cut to this
  maxStepsPerFrame?: number;
  now?: () => number;
}

const loopOptionsSchema = z
  .object({
    stepMs: z.number().finite().positive(),
    maxFrameMs: z.number().finite().positive(),
    maxStepsPerFrame: z.number().int().positive(),
  })
  .superRefine((opts, ctx) => {
    if (opts.maxFrameMs < opts.stepMs) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['maxFrameMs'], message: 'must be at least stepMs' });
    }
  });

/**
 * Fixed-timestep driver. Wall-clock time goes into an accumulator and comes out as
 * whole steps of `stepMs`.
 */
export class FixedStepLoop {
  readonly stepMs: number;
  private readonly maxFrameMs: number;
  private readonly maxStepsPerFrame: number;
  private readonly now: () => number;
  private accumulator = 0;
  private lastTime = 0;
  private timerId?: NodeJS.Timeout;

  constructor(private readonly onStep: () => void, options: FixedStepLoopOptions = {}) {
    const parsed = loopOptionsSchema.safeParse({
      stepMs: options.stepMs ?? DEFAULT_STEP_MS,
      maxFrameMs: options.maxFrameMs ?? DEFAULT_MAX_FRAME_MS,
      maxStepsPerFrame: options.maxStepsPerFrame ?? DEFAULT_MAX_STEPS_PER_FRAME,
    });
    if (!parsed.success) {
      throw new ConfigError(
        parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        'Invalid loop options',
      );
    }
    this.stepMs = parsed.data.stepMs;
    this.maxFrameMs = parsed.data.maxFrameMs;
    this.maxStepsPerFrame = parsed.data.maxStepsPerFrame;
    this.now = options.now ?? (() => performance.now());
  }

  /** Feed elapsed time and run every step it covers. Returns the number of steps run. */
  advance(elapsedMs: number): number {
    this.accumulator += Math.max(0, Math.min(elapsedMs, this.maxFrameMs));

    let steps = 0;
    while (this.accumulator >= this.stepMs && steps < this.maxStepsPerFrame) {
      this.onStep();
      this.accumulator -= this.stepMs;
      steps++;
    }
    // Too far behind: drop the backlog instead of trying to catch up.
    if (this.accumulator >= this.stepMs) {
      this.accumulator %= this.stepMs;
    }
    return steps;
  }

  start(intervalMs: number = this.stepMs) {
    if (this.timerId) return;
    this.lastTime = this.now();
    this.timerId = setInterval(() => {
      const t = this.now();
      const elapsed = t - this.lastTime;
      this.lastTime = t;
      this.advance(elapsed);
    }, intervalMs);
  }

  stop() {
    if (this.timerId) {
      clearInterval(this.timerId);
      this.timerId = undefined;
    }
    this.accumulator = 0;
  }

  isRunning(): boolean {
    return this.timerId !== undefined;
  }
}
