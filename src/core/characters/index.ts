/**
 * Character tables - public API
 */

export {
  DEFAULT_APPROXIMATIONS,
  getApproximations,
  hasApproximations,
  listLocales,
  addApproximations,
  resetApproximations,
  resolveApproximations,
} from './approximations.js';

export { getStrippable, isStrippable } from './strippable.js';
