export { DEFAULT_WEIGHTS, DEFAULT_BOOST_TAGS } from './weights.js';
export type { ScoringWeights } from './weights.js';
export {
  score,
  scoreBreakdown,
  rankTasks,
  priorityComponent,
  dueDateComponent,
  statusComponent,
  tagComponent,
  stalenessComponent,
} from './score.js';
export type { ScoringOptions, ScoreBreakdown, RankedTask, RankOptions } from './score.js';
