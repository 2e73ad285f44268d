import { IllegalActionError } from './errors';
import {
  Action,
  GameEnvironment,
  Player,
  PLAYER_O,
  PLAYER_X,
  REWARD_DRAW,
  REWARD_LOSS,
  REWARD_ONGOING,
  REWARD_WIN,
  StateKey,
  StepResult,
} from './types';

export type Cell = Player | 0;

export const GRID_SIZE = 3;
const CELL_COUNT = GRID_SIZE * GRID_SIZE;

const LINES: ReadonlyArray<readonly [number, number, number]> = [
  [0, 1, 2],
  [3, 4, 5],
  [6, 7, 8],
  [0, 3, 6],
  [1, 4, 7],
  [2, 5, 8],
  [0, 4, 8],
  [2, 4, 6],
];

const CELL_CHARS: Record<string, string> = { '1': 'X', '-1': 'O', '0': '.' };

function encodeCell(cell: Cell): string {
  return CELL_CHARS[String(cell)] ?? '.';
}

/**
 * State keys look like `X.O......|O`: nine cells then the player to move.
 */
export function encodeState(cells: readonly Cell[], toMove: Player): StateKey {
  return `${cells.map(encodeCell).join('')}|${encodeCell(toMove)}`;
}

function hasWinningLine(boardPart: string): boolean {
  return LINES.some(([a, b, c]) => {
    const first = boardPart[a];
    return first !== undefined && first !== '.' && first === boardPart[b] && first === boardPart[c];
  });
}

/** Empty cells of an encoded board; none once a line is complete. */
function emptyCellsOf(boardPart: string): Action[] {
  if (hasWinningLine(boardPart)) {
    return [];
  }
  const actions: Action[] = [];
  for (let i = 0; i < CELL_COUNT; i += 1) {
    if (boardPart[i] === '.') {
      actions.push(i);
    }
  }
  return actions;
}

export class TicTacToeEnvironment implements GameEnvironment {
  private cells: Cell[] = new Array<Cell>(CELL_COUNT).fill(0);
  private toMove: Player = PLAYER_X;
  private finished = false;

  reset(): StateKey {
    this.cells = new Array<Cell>(CELL_COUNT).fill(0);
    this.toMove = PLAYER_X;
    this.finished = false;
    return this.getState();
  }

  getState(): StateKey {
    return encodeState(this.cells, this.toMove);
  }

  currentPlayer(): Player {
    return this.toMove;
  }

  legalActions(state?: StateKey): Action[] {
    if (state !== undefined) {
      const boardPart = state.split('|')[0] ?? '';
      return emptyCellsOf(boardPart);
    }
    if (this.finished) {
      return [];
    }
    const actions: Action[] = [];
    this.cells.forEach((cell, index) => {
      if (cell === 0) {
        actions.push(index);
      }
    });
    return actions;
  }

  applyAction(action: Action): StepResult {
    const legal = this.legalActions();
    if (!legal.includes(action)) {
      throw new IllegalActionError(action, legal);
    }
    const mover = this.toMove;
    this.cells[action] = mover;

    const winner = this.getWinner();
    const boardFull = this.cells.every((cell) => cell !== 0);
    const done = winner !== null || boardFull;

    let reward = REWARD_ONGOING;
    if (winner === mover) {
      reward = REWARD_WIN;
    } else if (winner !== null) {
      reward = REWARD_LOSS;
    } else if (done) {
      reward = REWARD_DRAW;
    }

    this.finished = done;
    if (!done) {
      this.toMove = mover === PLAYER_X ? PLAYER_O : PLAYER_X;
    }
    return { state: this.getState(), reward, done };
  }

  getWinner(): Player | null {
    for (const [a, b, c] of LINES) {
      const first = this.cells[a];
      if (first !== undefined && first !== 0 && first === this.cells[b] && first === this.cells[c]) {
        return first;
      }
    }
    return null;
  }

  isTerminal(): boolean {
    return this.finished;
  }

  render(): string {
    const rows: string[] = [];
    for (let row = 0; row < GRID_SIZE; row += 1) {
      const slice = this.cells.slice(row * GRID_SIZE, (row + 1) * GRID_SIZE);
      rows.push(slice.map(encodeCell).join(' '));
    }
    return rows.join('\n');
  }
}
