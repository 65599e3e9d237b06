// Shared package entry point
export { PROJECT_NAME, VERSION } from './constants';

export * from './schemas/extraction-result';
export * from './logger';
