import {
  ClassificationInput,
  ClassificationOptions,
  Issue,
  IssueSeverity,
  TemplateValues,
} from '../common/interfaces/issue.interface';
import { IssueTemplate, NextStep, Rule, RuleTable } from '../common/interfaces/rules.interface';
import { extractLogTimestamp, logDebug, renderTemplate } from '../utils/utils';
import { matchesAny } from './matcher';
import { loadRuleTable } from './rules';

/**
 * Maps a blob of Kubernetes event/log messages to structured issues.
 * ====================================================================
 * Evaluation runs in two phases:
 * 1. Suppression: any known-benign pattern yields `[]` straight away.
 * 2. Classification: every rule is tested in table order and each match
 *    contributes one issue. Rules are cumulative, not exclusive.
 *
 * When nothing matches, a single low-severity fallback issue is returned,
 * so non-suppressed input always produces at least one issue.
 *
 * @param input - messages plus the owning workload's kind and name
 * @param table - rule table, the bundled one by default
 * @param options - set `includeObservedAt` to stamp issues with a timestamp
 */
export function classifyMessages(
  input: ClassificationInput,
  table: RuleTable = loadRuleTable(),
  options: ClassificationOptions = {},
): Issue[] {
  const messages = input.messages ?? '';
  const values = templateValues(input);

  const suppression = table.suppressions.find((rule) => matchesAny(messages, rule.match));
  if (suppression) {
    logDebug(`Suppressed by ${suppression.id}`);
    return [];
  }

  const issues = matchingRules(table, messages, values.owner_kind).map((rule) => {
    logDebug(`Matched rule ${rule.id}`);
    return buildIssue(rule.issue, messages, values);
  });

  if (issues.length === 0) {
    logDebug('No rule matched, emitting fallback issue');
    issues.push(buildIssue(table.fallback, messages, values));
  }

  if (options.includeObservedAt) {
    const observedAt = extractLogTimestamp(messages, options.now);
    return issues.map((issue) => ({ ...issue, observed_at: observedAt }));
  }

  return issues;
}

/**
 * Collects the suggested next steps of every matching rule as a sorted,
 * de-duplicated list. Suppressed input yields no steps; unmatched input
 * yields the table's generic escalation step.
 */
export function recommendNextSteps(
  input: ClassificationInput,
  table: RuleTable = loadRuleTable(),
): string[] {
  const messages = input.messages ?? '';
  const values = templateValues(input);

  if (table.suppressions.some((rule) => matchesAny(messages, rule.match))) {
    return [];
  }

  const steps = new Set<string>();
  for (const rule of matchingRules(table, messages, values.owner_kind)) {
    renderNextSteps(rule.issue.next_steps, values).forEach((step) => steps.add(step));
  }

  if (steps.size === 0) {
    return [renderTemplate(table.next_steps_fallback, values)];
  }

  return [...steps].sort();
}

export function serializeIssues(issues: Issue[]): string {
  return JSON.stringify(issues, null, 2);
}

function matchingRules(table: RuleTable, messages: string, ownerKind: string): Rule[] {
  return table.rules.filter(
    (rule) =>
      appliesToKind(rule.match.owner_kinds, ownerKind) && matchesAny(messages, rule.match.messages),
  );
}

function appliesToKind(ownerKinds: string[] | undefined, ownerKind: string): boolean {
  return !ownerKinds || ownerKinds.includes(ownerKind);
}

function buildIssue(template: IssueTemplate, messages: string, values: TemplateValues): Issue {
  return {
    severity: toIssueSeverity(template.severity),
    title: renderTemplate(template.title, values),
    details: messages,
    next_steps: renderNextSteps(template.next_steps, values).join('\n'),
  };
}

function renderNextSteps(steps: NextStep[], values: TemplateValues): string[] {
  return steps
    .filter((step) => typeof step === 'string' || appliesToKind(step.owner_kinds, values.owner_kind))
    .map((step) => renderTemplate(typeof step === 'string' ? step : step.step, values));
}

function toIssueSeverity(severity: IssueTemplate['severity']): IssueSeverity {
  switch (severity) {
    case 1:
      return '1';
    case 2:
      return '2';
    case 3:
      return '3';
    case 4:
      return '4';
  }
}

function templateValues(input: ClassificationInput): TemplateValues {
  return {
    owner_kind: input.ownerKind ?? '',
    owner_name: input.ownerName ?? '',
    namespace: input.namespace ?? '',
    context: input.context ?? '',
  };
}
