#!/usr/bin/env node
import 'dotenv/config';

import { QLearningAgent, RandomAgent } from '../ai/agent';
import { Coach } from '../ai/coach';
import { loadSettings, Settings } from '../config/settings';
import { createSeededRandom } from '../core/random';
import { TicTacToeEnvironment } from '../core/tictactoe';
import { PLAYER_X } from '../core/types';
import { isRankCriterion, ModelComparator } from '../ranking/comparator';
import { EloSystem } from '../ranking/elo';
import { Tournament } from '../ranking/tournament';
import { ModelStore } from '../storage/model_store';
import { runAutoMLJob, runTournamentJob, runTrainJob } from '../tasks/jobs';
import { formatNumber } from '../training/common';
import { reevaluateModel } from '../training/trainer';

type Command =
  | 'train'
  | 'evaluate'
  | 'tournament'
  | 'leaderboard'
  | 'rank'
  | 'automl'
  | 'models'
  | 'history'
  | 'hint'
  | 'play';

const COMMANDS: readonly Command[] = [
  'train',
  'evaluate',
  'tournament',
  'leaderboard',
  'rank',
  'automl',
  'models',
  'history',
  'hint',
  'play',
];

const USAGE = `Usage: qtable-arena <command> [options]

  train        --episodes N --eval-games N --eval-seeds N --seed N --name NAME --resume MODEL
               --alpha A --gamma G --epsilon-min E --epsilon-decay D
  evaluate     --model MODEL --games N --seeds N --seed N
  tournament   --models a,b,c --games N --elimination --random --no-elo
  leaderboard  --top N
  rank         --criterion compositeScore|winRate|... --top N --q-table
  automl       --grid | --random-search  --iterations N --max-configs N --episodes N --eval-games N
  models
  history      --limit N
  hint         --model MODEL --state "X.O......|X"
  play         --model MODEL --seed N`;

function isCommand(value: string | undefined): value is Command {
  return COMMANDS.some((command) => command === value);
}

const args = process.argv.slice(3);

const getNumber = (flag: string, fallback: number): number => {
  const index = args.indexOf(flag);
  if (index >= 0 && index + 1 < args.length) {
    const value = Number(args[index + 1]);
    if (!Number.isNaN(value)) {
      return value;
    }
  }
  return fallback;
};

const getOptionalNumber = (flag: string): number | undefined => {
  const value = getNumber(flag, Number.NaN);
  return Number.isNaN(value) ? undefined : value;
};

const getString = (flag: string, fallback: string): string => {
  const index = args.indexOf(flag);
  if (index >= 0 && index + 1 < args.length) {
    return args[index + 1] ?? fallback;
  }
  return fallback;
};

const getOptionalString = (flag: string): string | undefined => {
  const value = getString(flag, '');
  return value === '' ? undefined : value;
};

const hasFlag = (flag: string): boolean => args.includes(flag);

// eslint-disable-next-line no-console
const print = (message: string): void => console.log(message);

function train(settings: Settings): void {
  const summary = runTrainJob(
    {
      kind: 'train',
      episodes: getOptionalNumber('--episodes'),
      evalGames: getOptionalNumber('--eval-games'),
      evalSeeds: getOptionalNumber('--eval-seeds'),
      baseSeed: getOptionalNumber('--seed'),
      name: getOptionalString('--name'),
      resume: getOptionalString('--resume'),
      alpha: getOptionalNumber('--alpha'),
      gamma: getOptionalNumber('--gamma'),
      epsilonMin: getOptionalNumber('--epsilon-min'),
      epsilonDecay: getOptionalNumber('--epsilon-decay'),
    },
    settings,
  );
  print(
    `Trained ${summary.numEpisodes} episodes in ${formatNumber(summary.duration, 1)}s: ` +
      `win=${formatNumber(summary.winRate, 1)}% draw=${formatNumber(summary.drawRate, 1)}% ` +
      `loss=${formatNumber(summary.lossRate, 1)}% states=${summary.statesLearned}`,
  );
  if (summary.evaluation) {
    const evaluation = summary.evaluation;
    print(
      `Evaluation (${evaluation.numSeeds} seeds x ${evaluation.numGames} games): ` +
        `win=${formatNumber(evaluation.meanWinRate, 1)}% ± ${formatNumber(evaluation.stdWinRate, 1)} ` +
        `draw=${formatNumber(evaluation.meanDrawRate, 1)}% loss=${formatNumber(evaluation.meanLossRate, 1)}%`,
    );
  }
  for (const savedPath of summary.savedPaths) {
    print(`Saved ${savedPath}`);
  }
}

function evaluate(settings: Settings): void {
  const store = new ModelStore(settings.modelsDir);
  const model = getString('--model', 'q_table');
  const result = reevaluateModel(store, model, new TicTacToeEnvironment(), {
    numGames: getNumber('--games', settings.evalGames),
    numSeeds: getNumber('--seeds', settings.evalSeeds),
    baseSeed: getNumber('--seed', settings.evalBaseSeed),
  });
  if (!result) {
    throw new Error(`Model could not be loaded: ${store.resolvePath(model)}`);
  }
  for (const seed of result.seedResults) {
    print(
      `seed ${seed.seed}: ${seed.wins}W ${seed.draws}D ${seed.losses}L ` +
        `(win=${formatNumber(seed.winRate, 1)}%)`,
    );
  }
  print(
    `mean win=${formatNumber(result.meanWinRate, 1)}% std=${formatNumber(result.stdWinRate, 2)} ` +
      `range=[${formatNumber(result.minWinRate, 1)}, ${formatNumber(result.maxWinRate, 1)}]`,
  );
}

function tournament(settings: Settings): void {
  const models = getOptionalString('--models');
  const result = runTournamentJob(
    {
      kind: 'tournament',
      mode: hasFlag('--elimination') ? 'elimination' : 'round_robin',
      models: models?.split(',').map((item) => item.trim()).filter((item) => item !== ''),
      gamesPerMatch: getOptionalNumber('--games'),
      updateElo: hasFlag('--no-elo') ? false : undefined,
      includeRandom: hasFlag('--random'),
    },
    settings,
  );
  print(`Champion: ${result.champion ?? 'none'} (${formatNumber(result.duration, 1)}s)`);
}

function leaderboard(settings: Settings): void {
  const elo = new EloSystem({
    filePath: settings.eloPath,
    kFactor: settings.eloKFactor,
    initialRating: settings.eloInitialRating,
  });
  const entries = elo.getLeaderboard(getNumber('--top', 10));
  if (entries.length === 0) {
    print('No rated models yet.');
    return;
  }
  entries.forEach((entry, index) => {
    print(`${String(index + 1).padStart(3)}. ${entry.label.padEnd(40)} ${formatNumber(entry.rating, 1)}`);
  });
}

function rank(settings: Settings): void {
  const criterion = getString('--criterion', 'compositeScore');
  if (!isRankCriterion(criterion)) {
    throw new Error(`Unknown ranking criterion: ${criterion}`);
  }
  const comparator = new ModelComparator(new ModelStore(settings.modelsDir));
  const { unavailable } = comparator.computeMetricsForAll({ includeQTable: hasFlag('--q-table') });
  const topN = getOptionalNumber('--top');
  comparator.rankModels(criterion, topN).forEach(({ model, metrics }, index) => {
    print(
      `${String(index + 1).padStart(3)}. ${model.name.padEnd(40)} ${criterion}=${formatNumber(metrics[criterion])} ` +
        `composite=${formatNumber(metrics.compositeScore)} win=${formatNumber(metrics.winRate, 1)}%`,
    );
  });
  for (const { model, reason } of unavailable) {
    print(`     ${model.name}: ${reason}`);
  }
}

function automl(settings: Settings): void {
  const result = runAutoMLJob(
    {
      kind: 'automl',
      mode: hasFlag('--grid') ? 'grid' : 'random',
      iterations: getOptionalNumber('--iterations'),
      maxConfigs: getOptionalNumber('--max-configs'),
      numEpisodes: getOptionalNumber('--episodes'),
      evalGames: getOptionalNumber('--eval-games'),
      evalSeeds: getOptionalNumber('--eval-seeds'),
    },
    settings,
  );
  print(`Best score ${formatNumber(result.bestScore)} with ${JSON.stringify(result.bestConfig)}`);
}

function models(settings: Settings): void {
  const store = new ModelStore(settings.modelsDir);
  const summaries = store.list();
  if (summaries.length === 0) {
    print(`No models in ${store.modelsDir}`);
    return;
  }
  for (const model of summaries) {
    const winRate = model.metadata.final_win_rate;
    print(
      `${model.name.padEnd(40)} ${model.timestamp}  states=${model.states} ` +
        `win=${winRate === undefined ? 'n/a' : `${formatNumber(winRate, 1)}%`} ${formatNumber(model.sizeKb, 1)}KB`,
    );
  }
}

function history(settings: Settings): void {
  const tournamentRunner = new Tournament(new TicTacToeEnvironment(), {
    historyPath: settings.tournamentHistoryPath,
  });
  for (const entry of tournamentRunner.getHistory(getNumber('--limit', 10))) {
    print(JSON.stringify(entry));
  }
}

function loadAgent(settings: Settings): QLearningAgent {
  const store = new ModelStore(settings.modelsDir);
  const model = getString('--model', 'q_table');
  const agent = new QLearningAgent();
  if (!store.load(agent, model)) {
    throw new Error(`Model could not be loaded: ${store.resolvePath(model)}`);
  }
  return agent;
}

function hint(settings: Settings): void {
  const coach = new Coach(loadAgent(settings));
  const env = new TicTacToeEnvironment();
  const state = getString('--state', env.reset());
  const legal = env.legalActions(state);
  const advice = coach.advise(state, legal);
  print(`Best cell ${advice.action} (${advice.confidence})`);
  for (const line of coach.hints(state, legal)) {
    print(line);
  }
}

function play(settings: Settings): void {
  const agent = loadAgent(settings);
  const opponent = new RandomAgent(createSeededRandom(getNumber('--seed', settings.evalBaseSeed)));
  const coach = new Coach(agent);
  const env = new TicTacToeEnvironment();
  let state = env.reset();
  let done = false;
  while (!done) {
    const legal = env.legalActions();
    const agentToMove = env.currentPlayer() === PLAYER_X;
    const action = agentToMove ? coach.advise(state, legal).action : opponent.chooseAction(state, legal);
    ({ state, done } = env.applyAction(action));
    print(`${agentToMove ? 'agent' : 'random'} -> ${action}\n${env.render()}\n`);
  }
  const winner = env.getWinner();
  print(winner === null ? 'Draw' : winner === PLAYER_X ? 'Agent wins' : 'Random wins');
}

const HANDLERS: Record<Command, (settings: Settings) => void> = {
  train,
  evaluate,
  tournament,
  leaderboard,
  rank,
  automl,
  models,
  history,
  hint,
  play,
};

function main(): void {
  const command = process.argv[2];
  if (!isCommand(command)) {
    print(USAGE);
    process.exitCode = command === undefined || command === '--help' ? 0 : 1;
    return;
  }
  HANDLERS[command](loadSettings());
}

try {
  main();
} catch (error) {
  // eslint-disable-next-line no-console
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
}
