import { describe, it, expect, afterEach } from 'vitest';
import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { createRulePolicy, loadRules } from '../../src/infrastructure/policy/rules-file.js';

const TMP_DIR = join(process.cwd(), '.tmp-test-rules');

function writeRules(content: string): string {
  mkdirSync(TMP_DIR, { recursive: true });
  const path = join(TMP_DIR, 'rules.json');
  writeFileSync(path, content, 'utf-8');
  return path;
}

const validRule = {
  id: 'any-rows',
  title: '{{count}} rows',
  condition: { type: 'threshold', metric: 'count', operator: '>', value: 0 },
};

describe('loadRules', () => {
  afterEach(() => {
    rmSync(TMP_DIR, { recursive: true, force: true });
  });

  it('loads a valid rule file', () => {
    const path = writeRules(JSON.stringify({ rules: [validRule] }));
    const rules = loadRules(path);
    expect(rules).toHaveLength(1);
    expect(rules[0]?.severity).toBe('warning');
    expect(createRulePolicy(path).size).toBe(1);
  });

  it('fails on a missing file', () => {
    expect(() => loadRules(join(TMP_DIR, 'missing.json'))).toThrow(
      expect.objectContaining({ kind: 'InvalidConfig', context: { rules_file: join(TMP_DIR, 'missing.json') } }),
    );
  });

  it('fails on invalid JSON', () => {
    const path = writeRules('{ rules: ');
    expect(() => loadRules(path)).toThrow(/^fail to read rule file: /);
  });

  it('fails on an invalid rule', () => {
    const path = writeRules(JSON.stringify({ rules: [{ ...validRule, condition: { type: 'threshold' } }] }));
    expect(() => loadRules(path)).toThrow(expect.objectContaining({ kind: 'InvalidConfig', message: 'invalid rule file' }));
  });
});
