// Extraction package entry point
export const EXTRACTION_VERSION = '1.0.0';

export * from './config';
export * from './errors';
export * from './extractors/types';
export * from './extractors/vendor';
export * from './extractors/amount';
export * from './extractors/date';
export * from './extractors/line-items';
export * from './classifier/category';
export * from './pipeline';
