/**
 * Custom configuration training example: two learners, one tournament.
 */

import { QLearningAgent, RandomAgent } from '../src/ai/agent';
import { TicTacToeEnvironment } from '../src/core/tictactoe';
import { EloSystem } from '../src/ranking/elo';
import { Tournament } from '../src/ranking/tournament';
import { ModelStore } from '../src/storage/model_store';
import { Trainer } from '../src/training/trainer';

console.log('🎮 Q-learning with custom configurations\n');

const store = new ModelStore('models/examples');

const configs = [
  { name: 'fast_learner', alpha: 0.4, gamma: 0.9, epsilonDecay: 0.999 },
  { name: 'patient_learner', alpha: 0.1, gamma: 0.99, epsilonDecay: 0.9997 },
];

const agents = configs.map((config) => {
  const agent = new QLearningAgent({
    alpha: config.alpha,          // Step size
    gamma: config.gamma,          // Discount future rewards
    epsilonDecay: config.epsilonDecay, // Exploration decay per episode
  });
  const trainer = new Trainer(agent, new TicTacToeEnvironment(), {
    store,
    logInterval: 5000,
    verbose: true,
  });
  const summary = trainer.train(20000, {
    evalGames: 200,
    evalSeeds: 3,
    name: config.name,
  });
  console.log(
    `${config.name}: eval win ${summary.evaluation?.meanWinRate.toFixed(1)}% ` +
      `(± ${summary.evaluation?.stdWinRate.toFixed(1)}), ${summary.statesLearned} states\n`,
  );
  return { name: config.name, policy: agent };
});

const tournament = new Tournament(new TicTacToeEnvironment(), {
  elo: new EloSystem({ filePath: null }),
  verbose: true,
});
const result = tournament.roundRobin([...agents, { name: 'random', policy: new RandomAgent() }], {
  gamesPerMatch: 100,
});

console.log('\n=== Leaderboard ===');
for (const entry of tournament.elo.getLeaderboard()) {
  console.log(`${entry.label.padEnd(20)} ${entry.rating.toFixed(0)}`);
}
console.log(`\n✓ Champion: ${result.champion}`);
