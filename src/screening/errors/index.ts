export * from './types';
export * from './gracefulDegradation';
