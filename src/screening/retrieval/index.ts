export * from './evidenceRetriever';
export * from './vectorIndex';
export * from './embedding';
