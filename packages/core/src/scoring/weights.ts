export interface ScoringWeights {
  /** Multiplied by the priority weight (1-4) */
  readonly priorityMultiplier: number;
  /** Bonus for overdue tasks; the due-date component never exceeds it */
  readonly dueMaxBonus: number;
  /** Hours remaining at which the due-date bonus is half of the maximum */
  readonly dueHorizonHours: number;
  readonly statusDone: number;
  readonly statusInProgress: number;
  readonly statusReview: number;
  /** Added once when any tag is a boost tag */
  readonly tagBoost: number;
  readonly stalenessPerDay: number;
  readonly stalenessCapDays: number;
}

export const DEFAULT_WEIGHTS: ScoringWeights = {
  priorityMultiplier: 10,
  dueMaxBonus: 30,
  dueHorizonHours: 24,
  statusDone: -100,
  statusInProgress: 5,
  statusReview: 3,
  tagBoost: 8,
  stalenessPerDay: 0.25,
  stalenessCapDays: 14,
};

export const DEFAULT_BOOST_TAGS: readonly string[] = ['urgent', 'important', 'critical', 'blocker'];
