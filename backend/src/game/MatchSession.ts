import { randomUUID } from 'node:crypto';
import { EventEmitter } from 'events';
import { createLogger, Logger } from '../utils/logger';
import { createMatchConfig } from './config';
import { createMatch, restartMatch, startRally, stepMatch, toSnapshot } from './engine';
import { FixedStepLoop, FixedStepLoopOptions } from './loop';
import { RandomSource, systemRandom } from './random';
import { InputCommand, MatchConfig, MatchSnapshot, MatchState, PlayerInput, Side } from './types';

export interface MatchSessionEvents {
  state: MatchSnapshot;
  score: { scorer: Side; score: { player: number; ai: number } };
  finished: { winner: Side; score: { player: number; ai: number } };
}

export interface MatchSessionOptions {
  sessionId?: string;
  config?: Readonly<MatchConfig>;
  rng?: RandomSource;
  logger?: Logger;
  // Resume from an existing state instead of a fresh match (replays, tests).
  initialState?: MatchState;
}

type QueuedCommand = 'START' | 'RESTART';

/**
 * Owns one match: the current state, the held-key flags written by the input side,
 * and the commands waiting for the next tick. Renderers subscribe to `state` and
 * never touch the match directly.
 */
export class MatchSession {
  public readonly sessionId: string;
  public readonly config: Readonly<MatchConfig>;
  private state: MatchState;
  private held: PlayerInput = { up: false, down: false };
  private pending: QueuedCommand[] = [];
  private readonly rng: RandomSource;
  private readonly log: Logger;
  private readonly events = new EventEmitter();

  constructor(options: MatchSessionOptions = {}) {
    this.sessionId = options.sessionId ?? randomUUID();
    this.config = options.config ?? createMatchConfig();
    this.rng = options.rng ?? systemRandom;
    this.log = options.logger ?? createLogger({ sessionId: this.sessionId });
    this.state = options.initialState ?? createMatch(this.config);
  }

  on<E extends keyof MatchSessionEvents>(event: E, listener: (payload: MatchSessionEvents[E]) => void): this {
    this.events.on(event, listener);
    return this;
  }

  off<E extends keyof MatchSessionEvents>(event: E, listener: (payload: MatchSessionEvents[E]) => void): this {
    this.events.off(event, listener);
    return this;
  }

  private emit<E extends keyof MatchSessionEvents>(event: E, payload: MatchSessionEvents[E]) {
    this.events.emit(event, payload);
  }

  handleCommand(command: InputCommand) {
    switch (command.type) {
      case 'MOVE_UP':
        this.held = { ...this.held, up: command.held };
        break;
      case 'MOVE_DOWN':
        this.held = { ...this.held, down: command.held };
        break;
      case 'START':
      case 'RESTART':
        this.pending.push(command.type);
        break;
    }
  }

  // A copy: the live state belongs to the session.
  getState(): MatchState {
    return structuredClone(this.state);
  }

  snapshot(): MatchSnapshot {
    return toSnapshot(this.state);
  }

  tick(): MatchSnapshot {
    this.applyPending();

    const prev = this.state;
    this.state = stepMatch(prev, this.held, this.config, this.rng);

    const { score } = this.state;
    if (score.player !== prev.score.player || score.ai !== prev.score.ai) {
      const scorer: Side = score.player !== prev.score.player ? 'player' : 'ai';
      this.log.info({ scorer, score }, 'Point scored');
      this.emit('score', { scorer, score: { ...score } });
    }
    if (this.state.status === 'FINISHED' && prev.status !== 'FINISHED' && this.state.winner) {
      this.log.info({ winner: this.state.winner, score }, 'Match finished');
      this.emit('finished', { winner: this.state.winner, score: { ...score } });
    }

    const snapshot = toSnapshot(this.state);
    this.emit('state', snapshot);
    return snapshot;
  }

  createLoop(options?: FixedStepLoopOptions): FixedStepLoop {
    return new FixedStepLoop(() => {
      this.tick();
    }, options);
  }

  private applyPending() {
    const commands = this.pending;
    this.pending = [];
    for (const command of commands) {
      const before = this.state;
      if (command === 'START') {
        this.state = startRally(before, this.config, this.rng);
        if (this.state !== before) {
          this.log.info({ tick: this.state.tick, vy: this.state.ball.vy }, 'Rally started');
        }
      } else {
        this.state = restartMatch(before, this.config);
        if (this.state !== before) {
          this.log.info('Match restarted');
        }
      }
      if (this.state === before) {
        this.log.debug({ command, status: before.status }, 'Command ignored');
      }
    }
  }
}
