export type Side = 'player' | 'ai';

export type MatchStatus = 'IDLE' | 'ACTIVE' | 'FINISHED';

export type AIDifficulty = 'EASY' | 'NORMAL' | 'HARD';

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

// Velocities are whole pixels per tick.
export interface Ball extends Rect {
  vx: number;
  vy: number;
}

export interface MatchConfig {
  width: number;
  height: number;
  paddleWidth: number;
  paddleHeight: number;
  paddleInset: number; // gap between a paddle and its side wall
  ballSize: number;
  paddleSpeed: number;
  ballSpeed: number;
  winningScore: number;
  speedIncrement: number;
  maxSpeedMultiplier: number;
  aiDifficulty: AIDifficulty;
}

export interface MatchState {
  tick: number;
  status: MatchStatus;
  ball: Ball;
  paddles: { player: Rect; ai: Rect };
  score: { player: number; ai: number };
  speedMultiplier: number;
  winner: Side | null;
}

export interface MatchSnapshot {
  tick: number;
  state: MatchStatus;
  playerPaddle: Rect;
  aiPaddle: Rect;
  ball: Rect;
  playerScore: number;
  aiScore: number;
  winner: Side | null;
}

export interface PlayerInput {
  up: boolean;
  down: boolean;
}

export type InputCommand =
  | { type: 'MOVE_UP'; held: boolean }
  | { type: 'MOVE_DOWN'; held: boolean }
  | { type: 'START' }
  | { type: 'RESTART' };

export const DEFAULT_CONFIG: MatchConfig = {
  width: 800,
  height: 600,
  paddleWidth: 15,
  paddleHeight: 100,
  paddleInset: 50,
  ballSize: 20,
  paddleSpeed: 5,
  ballSpeed: 4,
  winningScore: 10,
  speedIncrement: 0.1,
  maxSpeedMultiplier: 3.0,
  aiDifficulty: 'NORMAL',
};

export const IDLE_INPUT: PlayerInput = { up: false, down: false };
