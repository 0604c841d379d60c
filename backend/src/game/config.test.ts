import { describe, it, expect } from 'vitest';
import { createMatchConfig, loadMatchConfigFromEnv } from './config';
import { ConfigError } from './errors';
import { DEFAULT_CONFIG } from './types';

describe('createMatchConfig', () => {
  it('should return the defaults, frozen', () => {
    const config = createMatchConfig();
    expect(config).toEqual(DEFAULT_CONFIG);
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('should apply overrides', () => {
    const config = createMatchConfig({ width: 1024, winningScore: 5, paddleHeight: undefined });
    expect(config.width).toBe(1024);
    expect(config.winningScore).toBe(5);
    expect(config.paddleHeight).toBe(100);
  });

  it('should reject non-positive dimensions', () => {
    try {
      createMatchConfig({ height: -1 });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      expect((err as ConfigError).issues).toContain('height: Number must be greater than 0');
    }
  });

  it('should reject a paddle taller than the arena', () => {
    expect(() => createMatchConfig({ paddleHeight: 600 })).toThrow(ConfigError);
    try {
      createMatchConfig({ paddleHeight: 600 });
    } catch (err) {
      expect((err as ConfigError).issues).toEqual(['paddleHeight: must be smaller than height']);
    }
  });

  it('should reject paddles that overlap', () => {
    expect(() => createMatchConfig({ width: 130 })).toThrow(/paddleInset: paddles do not fit inside width/);
  });

  it('should reject a speed cap above 3x the base speed', () => {
    try {
      createMatchConfig({ maxSpeedMultiplier: 5 });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      expect((err as ConfigError).issues).toEqual(['maxSpeedMultiplier: Number must be less than or equal to 3']);
    }
  });

  it('should accept a lower speed cap', () => {
    expect(createMatchConfig({ maxSpeedMultiplier: 2 }).maxSpeedMultiplier).toBe(2);
  });

  it('should reject fractional speeds', () => {
    expect(() => createMatchConfig({ ballSpeed: 2.5 })).toThrow(ConfigError);
  });
});

describe('loadMatchConfigFromEnv', () => {
  it('should read RALLY_ variables over the defaults', () => {
    const config = loadMatchConfigFromEnv({ RALLY_WIDTH: '1024', RALLY_AI_DIFFICULTY: 'hard' });
    expect(config.width).toBe(1024);
    expect(config.aiDifficulty).toBe('HARD');
    expect(config.height).toBe(600);
  });

  it('should ignore unrelated variables', () => {
    expect(loadMatchConfigFromEnv({ HOME: '/tmp' })).toEqual(DEFAULT_CONFIG);
  });

  it('should reject a zero winning score', () => {
    expect(() => loadMatchConfigFromEnv({ RALLY_WINNING_SCORE: '0' })).toThrow(ConfigError);
  });

  it('should reject an unknown difficulty', () => {
    expect(() => loadMatchConfigFromEnv({ RALLY_AI_DIFFICULTY: 'insane' })).toThrow(ConfigError);
  });
});
