/**
 * CLI Commands Index
 *
 * - run:   one catalog run (fetch, gate, enrich, transform, score, persist)
 * - score: quality metrics for an existing dataset file
 */

export { registerRunCommand, executeRun, createRunnerFromConfig, outcomeExitCode, parsePositiveInt } from './run.js';
export type { RunOptions, RunCommandResult, RunnerFactory } from './run.js';
export { registerScoreCommand, executeScore } from './score.js';
export type { ScoreCommandResult } from './score.js';
