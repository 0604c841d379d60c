import { loadMatchConfigFromEnv } from '../src/game/config';
import { MatchSession } from '../src/game/MatchSession';
import { createSeededRandom } from '../src/game/random';
import { MatchSnapshot } from '../src/game/types';

const MAX_TICKS = 200_000;

// Headless match: a follower steers the player paddle, serves are automatic.
function main() {
  const seed = Number(process.argv[2] ?? 42);
  const session = new MatchSession({ config: loadMatchConfigFromEnv(), rng: createSeededRandom(seed) });

  let rallies = 0;
  session.on('score', ({ scorer, score }) => {
    rallies++;
    console.log(`Rally ${rallies}: ${scorer} scores (${score.player}-${score.ai})`);
  });

  const steer = (snap: MatchSnapshot) => {
    const paddleCentre = snap.playerPaddle.y + snap.playerPaddle.height / 2;
    const ballCentre = snap.ball.y + snap.ball.height / 2;
    session.handleCommand({ type: 'MOVE_UP', held: ballCentre < paddleCentre - 10 });
    session.handleCommand({ type: 'MOVE_DOWN', held: ballCentre > paddleCentre + 10 });
  };

  let snap = session.snapshot();
  while (snap.state !== 'FINISHED' && snap.tick < MAX_TICKS) {
    if (snap.state === 'IDLE') session.handleCommand({ type: 'START' });
    steer(snap);
    snap = session.tick();
  }

  console.table([{ seed, ticks: snap.tick, player: snap.playerScore, ai: snap.aiScore, winner: snap.winner ?? 'none' }]);
}

main();
