import fs from 'fs';
import os from 'os';
import path from 'path';

import { loadRuleTable, RuleTableError, validateRuleTable } from '../src/core/rules';

const validDocument = {
  suppressions: [{ id: 'benign', match: ['Synced'] }],
  rules: [
    {
      id: 'oom',
      match: { messages: ['OOMKilled'] },
      issue: { severity: 2, title: '{{owner_kind}} `{{owner_name}}` ran out of memory', next_steps: ['Raise memory limits'] },
    },
  ],
  fallback: { severity: 4, title: 'Investigate {{owner_name}}', next_steps: ['Escalate'] },
  next_steps_fallback: 'Escalate',
};

const violationsOf = (document: unknown): string[] => {
  try {
    validateRuleTable(document, 'test');
  } catch (error) {
    if (error instanceof RuleTableError) return error.violations;
    throw error;
  }
  return [];
};

describe('Rule table', () => {
  describe('bundled table', () => {
    it('should load and validate the bundled rules', () => {
      const table = loadRuleTable();

      expect(table.rules).toHaveLength(38);
      expect(table.suppressions.map((rule) => rule.id)).toEqual([
        'benign-container-created',
        'benign-reconciliation',
        'benign-secret-rotation',
      ]);
      expect(table.fallback.severity).toBe(4);
    });

    it('should reuse the validated bundled table', () => {
      expect(loadRuleTable()).toBe(loadRuleTable());
    });

    it('should list image pull failures before probe failures', () => {
      const ids = loadRuleTable().rules.map((rule) => rule.id);

      expect(ids.indexOf('image-pull-failure')).toBeLessThan(ids.indexOf('liveness-probe-failure'));
      expect(ids.indexOf('image-pull-failure')).toBeLessThan(ids.indexOf('startup-probe-failure'));
    });

    it('should gate kind-specific entries on their owner kind', () => {
      const gated = loadRuleTable()
        .rules.filter((rule) => rule.match.owner_kinds)
        .map((rule) => rule.id);

      expect(gated).toContain('statefulset-containers-not-ready');
      expect(gated).toContain('daemonset-node-taints');
      expect(gated).not.toContain('pod-initializing');
    });
  });

  describe('validateRuleTable', () => {
    it('should accept a well-formed table and default missing suppressions', () => {
      const { suppressions: _unused, ...withoutSuppressions } = validDocument;

      const table = validateRuleTable(withoutSuppressions, 'test');

      expect(table.suppressions).toEqual([]);
      expect(table.rules[0].id).toBe('oom');
    });

    it('should report every violation at once', () => {
      const violations = violationsOf({
        ...validDocument,
        rules: [
          {
            id: 'broken',
            match: { messages: [] },
            issue: { severity: 5, title: '', next_steps: ['Do something'] },
          },
        ],
      });

      expect(violations.some((v) => v.startsWith('rules.0.match.messages'))).toBe(true);
      expect(violations.some((v) => v.startsWith('rules.0.issue.severity'))).toBe(true);
      expect(violations.some((v) => v.startsWith('rules.0.issue.title'))).toBe(true);
    });

    it('should reject regex matchers that do not compile', () => {
      const violations = violationsOf({
        ...validDocument,
        rules: [
          {
            id: 'bad-regex',
            match: { messages: [{ type: 'regex', value: '(unclosed' }] },
            issue: { severity: 3, title: 'Bad', next_steps: ['Fix'] },
          },
        ],
      });

      expect(violations).toHaveLength(1);
      expect(violations[0].startsWith('rules.0.match.messages.0')).toBe(true);
    });

    it('should reject duplicate rule ids', () => {
      const violations = violationsOf({
        ...validDocument,
        rules: [validDocument.rules[0], validDocument.rules[0]],
      });

      expect(violations).toHaveLength(1);
      expect(violations[0]).toContain('duplicate value');
    });

    it('should reject gated next steps without owner kinds', () => {
      const violations = violationsOf({
        ...validDocument,
        fallback: { severity: 4, title: 'Investigate', next_steps: [{ step: 'Check PVCs', owner_kinds: [] }] },
      });

      expect(violations.some((v) => v.startsWith('fallback.next_steps.0'))).toBe(true);
    });

    it('should name the source in the error message', () => {
      expect(() => validateRuleTable({}, 'custom.json')).toThrow('Invalid rule table (custom.json):');
    });
  });

  describe('loadRuleTable from a file', () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'workload-issues-'));
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('should read and validate a custom table', () => {
      const file = path.join(tempDir, 'rules.json');
      fs.writeFileSync(file, JSON.stringify(validDocument));

      const table = loadRuleTable(file);

      expect(table.rules.map((rule) => rule.id)).toEqual(['oom']);
      expect(table.next_steps_fallback).toBe('Escalate');
    });

    it('should raise RuleTableError for unreadable JSON', () => {
      const file = path.join(tempDir, 'rules.json');
      fs.writeFileSync(file, '{ not json');

      expect(() => loadRuleTable(file)).toThrow(RuleTableError);
      expect(violationsOfFile(file)[0].startsWith('could not be read as JSON')).toBe(true);
    });

    it('should raise RuleTableError for a missing file', () => {
      expect(() => loadRuleTable(path.join(tempDir, 'missing.json'))).toThrow(RuleTableError);
    });
  });
});

function violationsOfFile(file: string): string[] {
  try {
    loadRuleTable(file);
  } catch (error) {
    if (error instanceof RuleTableError) return error.violations;
    throw error;
  }
  return [];
}
