/**
 * @valtype/core/filters - Filtering functions
 *
 * @module filters
 */

export {
  filterString,
  filterArray,
  filterRecord,
  filterCallable,
  filterNumber,
  filterInstance,
} from '../filters.js';
export { filters, type Filters } from '../groups.js';
