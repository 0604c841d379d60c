import { describe, it, expect, vi, afterEach } from 'vitest';
import { ConfigError } from './errors';
import { FixedStepLoop, FixedStepLoopOptions } from './loop';

describe('FixedStepLoop', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should run one step per whole interval and carry the remainder', () => {
    const onStep = vi.fn();
    const loop = new FixedStepLoop(onStep, { stepMs: 10 });

    expect(loop.advance(25)).toBe(2);
    expect(loop.advance(5)).toBe(1);
    expect(loop.advance(9)).toBe(0);
    expect(onStep).toHaveBeenCalledTimes(3);
  });

  it('should ignore negative elapsed time', () => {
    const onStep = vi.fn();
    const loop = new FixedStepLoop(onStep, { stepMs: 10 });
    expect(loop.advance(-100)).toBe(0);
    expect(loop.advance(10)).toBe(1);
  });

  it('should clamp long frames', () => {
    const onStep = vi.fn();
    const loop = new FixedStepLoop(onStep, { stepMs: 10, maxFrameMs: 50 });
    expect(loop.advance(1000)).toBe(5);
  });

  it('should drop the backlog once the per-frame step limit is hit', () => {
    const onStep = vi.fn();
    const loop = new FixedStepLoop(onStep, { stepMs: 10, maxFrameMs: 100, maxStepsPerFrame: 3 });
    expect(loop.advance(100)).toBe(3);
    expect(loop.advance(0)).toBe(0);
  });

  it('should drive steps from a timer until stopped', () => {
    vi.useFakeTimers();
    const onStep = vi.fn();
    const loop = new FixedStepLoop(onStep, { stepMs: 10, now: () => Date.now() });

    loop.start();
    expect(loop.isRunning()).toBe(true);
    vi.advanceTimersByTime(100);
    expect(onStep).toHaveBeenCalledTimes(10);

    loop.stop();
    expect(loop.isRunning()).toBe(false);
    vi.advanceTimersByTime(100);
    expect(onStep).toHaveBeenCalledTimes(10);
  });

  it('should not start twice', () => {
    vi.useFakeTimers();
    const onStep = vi.fn();
    const loop = new FixedStepLoop(onStep, { stepMs: 10, now: () => Date.now() });

    loop.start();
    loop.start();
    vi.advanceTimersByTime(30);
    expect(onStep).toHaveBeenCalledTimes(3);
    loop.stop();
  });

  describe('options', () => {
    const issuesFor = (options: FixedStepLoopOptions): string[] => {
      try {
        new FixedStepLoop(vi.fn(), options);
      } catch (err) {
        expect(err).toBeInstanceOf(ConfigError);
        return (err as ConfigError).issues;
      }
      return [];
    };

    it('should reject a zero step', () => {
      expect(issuesFor({ stepMs: 0 })).toEqual(['stepMs: Number must be greater than 0']);
    });

    it('should reject a non-finite step', () => {
      expect(() => new FixedStepLoop(vi.fn(), { stepMs: Infinity })).toThrow(ConfigError);
    });

    it('should reject a zero step budget per frame', () => {
      expect(issuesFor({ maxStepsPerFrame: 0 })).toEqual(['maxStepsPerFrame: Number must be greater than 0']);
    });

    it('should reject a fractional step budget per frame', () => {
      expect(issuesFor({ maxStepsPerFrame: 1.5 })).toEqual(['maxStepsPerFrame: Expected integer, received float']);
    });

    it('should reject a frame clamp shorter than one step', () => {
      expect(issuesFor({ stepMs: 10, maxFrameMs: 5 })).toEqual(['maxFrameMs: must be at least stepMs']);
    });

    it('should accept the defaults', () => {
      expect(issuesFor({})).toEqual([]);
    });
  });
});
