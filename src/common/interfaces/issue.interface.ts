import { OwnerKind } from './rules.interface';

export type IssueSeverity = '1' | '2' | '3' | '4';

/**
 * Structured issue record handed to the reporting platform.
 * Keys stay snake_case: the calling runbooks read them by name.
 */
export interface Issue {
  severity: IssueSeverity;
  title: string;
  details: string;
  next_steps: string;
  observed_at?: string;
}

export interface ClassificationInput {
  /** Event/log lines joined with newlines */
  messages: string;
  ownerKind: OwnerKind;
  ownerName: string;
  namespace?: string;
  /** Cluster context name, used in escalation steps */
  context?: string;
}

export interface ClassificationOptions {
  includeObservedAt?: boolean;
  now?: Date;
}

export type TemplateValues = {
  owner_kind: string;
  owner_name: string;
  namespace: string;
  context: string;
};
