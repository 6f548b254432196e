export * from './textUtils';
export * from './workHistory';
export * from './chunker';
export {
  aggregate as aggregateExperience,
  aggregateAll,
  dedupeJobMatches
} from './experienceAggregator';
export * from './profile';
export * from './jobRequirements';
