/**
 * Conditions Module
 */

export type {
  Condition,
  ConditionContext,
  ConditionPredicate,
  ConditionType,
  IConditionSet,
  TerminationConditions,
} from './types.js';

export {
  Always,
  Never,
  AtPass,
  BeforePass,
  AfterPass,
  AfterNPasses,
  EveryNPasses,
  AtTrial,
  AfterNTrials,
  EveryNCalls,
  AfterNCalls,
  AtNCalls,
  BeforeNCalls,
  AllHaveRun,
  While,
  NWhile,
  All,
  Any,
  NOf,
  Not,
} from './conditions.js';

export { ConditionSet } from './condition-set.js';
