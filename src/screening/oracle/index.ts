export * from './prompts';
export * from './faults';
export * from './gateway';
export * from './extractors';
