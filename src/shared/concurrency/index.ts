export * from './workerPool';
export * from './timeout';
