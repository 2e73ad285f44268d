export * from './core/types';
export * from './core/errors';
export * from './core/random';
export * from './core/tictactoe';
export * from './ai/agent';
export * from './ai/coach';
export * from './training/common';
export * from './training/trainer';
export * from './training/training_log';
export * from './training/automl';
export * from './storage/model_store';
export * from './ranking/metrics';
export * from './ranking/elo';
export * from './ranking/tournament';
export * from './ranking/comparator';
export * from './config/settings';
export * from './tasks/background_task';
export * from './tasks/requests';
export * from './tasks/jobs';
