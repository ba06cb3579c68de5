/**
 * @valtype/config - Default Configuration Values
 *
 * @packageDocumentation
 */

import type { ValtypeConfig } from './types.js';

/**
 * Default configuration: logging off, and `warn` / `json` once enabled.
 */
export const DEFAULT_CONFIG: ValtypeConfig = Object.freeze({
  logging: Object.freeze({
    enabled: false,
    level: 'warn',
    format: 'json',
  }),
});
