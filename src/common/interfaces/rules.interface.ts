export type MatchLine = string | { type: 'string' | 'regex'; value: string };

/**
 * Kubernetes resource kinds the bundled rule table knows about. Any other
 * kind is still accepted and only general rules apply to it.
 */
export type OwnerKind = 'Deployment' | 'StatefulSet' | 'DaemonSet' | (string & {});

export type SeverityLevel = 1 | 2 | 3 | 4;

export type NextStep = string | { step: string; owner_kinds: string[] };

export type IssueTemplate = {
  severity: SeverityLevel;
  title: string;
  next_steps: NextStep[];
};

export type Rule = {
  id: string;
  match: {
    messages: MatchLine[];
    owner_kinds?: string[];
  };
  issue: IssueTemplate;
};

export type SuppressionRule = {
  id: string;
  match: MatchLine[];
};

export type RuleTable = {
  suppressions: SuppressionRule[];
  rules: Rule[];
  fallback: IssueTemplate;
  next_steps_fallback: string;
};
