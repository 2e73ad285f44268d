export type Player = 1 | -1;

export const PLAYER_X: Player = 1;
export const PLAYER_O: Player = -1;

/** Hashable, immutable key produced by an environment. Never parsed by the learner. */
export type StateKey = string;

export type Action = number;

export type RandomSource = () => number;

export const REWARD_WIN = 1.0;
export const REWARD_LOSS = -1.0;
export const REWARD_DRAW = 0.5;
export const REWARD_ONGOING = 0.0;

export interface StepResult {
  state: StateKey;
  /** Reward seen by the player who just moved. */
  reward: number;
  done: boolean;
}

export interface GameEnvironment {
  reset(): StateKey;
  legalActions(state?: StateKey): Action[];
  applyAction(action: Action): StepResult;
  getWinner(): Player | null;
  currentPlayer(): Player;
}

export function otherPlayer(player: Player): Player {
  return player === PLAYER_X ? PLAYER_O : PLAYER_X;
}
