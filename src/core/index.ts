export { classifyMessages, recommendNextSteps, serializeIssues } from './classifier';
export { matchLine, matchesAny } from './matcher';
export { loadRuleTable, validateRuleTable, RuleTableError } from './rules';
export { collectWorkloadEvents, formatEvent, EventCollectionError } from './events';
export type { EventTypeFilter, WorkloadEventQuery } from './events';
export { initKube, getCoreV1 } from './kube';
export type * from '../common/interfaces/issue.interface';
export type * from '../common/interfaces/rules.interface';
