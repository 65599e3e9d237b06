/**
 * @fileoverview Receipt API Package Entry Point
 *
 * Wires file handling around the extraction core: text sources that turn an
 * uploaded file into raw text, and the receipt-processing handler that runs
 * the pipeline over it and reports a status-coded response.
 */

export const API_VERSION = '1.0.0';

export interface ApiInfo {
  name: string;
  version: string;
  status: 'healthy' | 'degraded' | 'down';
}

/**
 * Basic service information for health checks.
 *
 * @example
 * ```typescript
 * const info = getApiInfo();
 * // { name: 'receipt-extraction-api', version: '1.0.0', status: 'healthy' }
 * ```
 */
export function getApiInfo(): ApiInfo {
  return {
    name: 'receipt-extraction-api',
    version: API_VERSION,
    status: 'healthy'
  };
}

export * from './services/text-source';
export * from './handlers/receipt-processing';
