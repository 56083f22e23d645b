/**
 * @efaktur/steps-deviation
 *
 * Reconciles extracted and authoritative invoice fields.
 *
 * @packageDocumentation
 */

export {
  DEFAULT_NAME_POLICY,
  createFieldComparators,
  normalizeNameForComparison,
  type Comparator,
  type ComparatorOptions,
  type FieldComparators,
  type NameComparisonPolicy,
} from './comparators.js';

export {
  compareFieldSets,
  createDeviationEngine,
  deviationMessage,
  reconcile,
  MATCH_MESSAGE,
  type DeviationEngine,
} from './compare-fields.js';
