export { score, yearsValue, STRENGTH_VALUES, EVIDENCE_WEIGHT, YEARS_WEIGHT } from './skillScorer';
export type { SkillScoreOptions } from './skillScorer';
export {
  aggregate as aggregateScores,
  experienceScore,
  isCoreRequirement,
  SCORE_WEIGHTS
} from './scoreAggregator';
export * from './experienceLookup';
export * from './report';
