import { describe, it, expect, afterEach } from 'vitest';
import { writeFileSync, mkdirSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { loadNotificationConfig, DEFAULT_CONFIG } from '../../src/infrastructure/notifications/config.js';

const TMP_DIR = join(process.cwd(), '.tmp-test-config');

function writeTmpYaml(content: string): string {
  mkdirSync(TMP_DIR, { recursive: true });
  const path = join(TMP_DIR, 'notifications.yaml');
  writeFileSync(path, content, 'utf-8');
  return path;
}

describe('loadNotificationConfig', () => {
  afterEach(() => {
    rmSync(TMP_DIR, { recursive: true, force: true });
  });

  it('returns defaults when file does not exist', () => {
    const config = loadNotificationConfig('/nonexistent/path.yaml', {});
    expect(config).toEqual(DEFAULT_CONFIG);
    expect(config).not.toBe(DEFAULT_CONFIG);
  });

  it('returns defaults for empty file', () => {
    const path = writeTmpYaml('');
    expect(loadNotificationConfig(path, {})).toEqual(DEFAULT_CONFIG);
  });

  it('parses log enabled=false', () => {
    const path = writeTmpYaml('log:\n  enabled: false\n');
    expect(loadNotificationConfig(path, {}).log.enabled).toBe(false);
  });

  it('parses redis config', () => {
    const path = writeTmpYaml("redis:\n  enabled: true\n  channel: 'ops_alerts'\n");
    expect(loadNotificationConfig(path, {}).redis).toEqual({ enabled: true, channel: 'ops_alerts' });
  });

  it('keeps the default redis channel when blank', () => {
    const path = writeTmpYaml('redis:\n  enabled: true\n  channel: ""\n');
    expect(loadNotificationConfig(path, {}).redis.channel).toBe('batchwatch_alerts');
  });

  it('parses slack config', () => {
    const path = writeTmpYaml(
      '# alert routing\nslack:\n  enabled: true\n  webhook_url: "https://hooks.slack.test/abc"\n  channel: "#ops"\n',
    );
    expect(loadNotificationConfig(path, {}).slack).toEqual({
      enabled: true,
      webhook_url: 'https://hooks.slack.test/abc',
      channel: '#ops',
    });
  });

  it('fills an empty webhook url from SLACK_WEBHOOK_URL', () => {
    const path = writeTmpYaml('slack:\n  enabled: true\n  webhook_url: ""\n');
    const config = loadNotificationConfig(path, { SLACK_WEBHOOK_URL: 'https://hooks.slack.test/env' });
    expect(config.slack.webhook_url).toBe('https://hooks.slack.test/env');
  });

  it('prefers the file webhook url over the environment', () => {
    const path = writeTmpYaml('slack:\n  webhook_url: "https://hooks.slack.test/file"\n');
    const config = loadNotificationConfig(path, { SLACK_WEBHOOK_URL: 'https://hooks.slack.test/env' });
    expect(config.slack.webhook_url).toBe('https://hooks.slack.test/file');
  });

  it('ignores unknown sections', () => {
    const path = writeTmpYaml('pagerduty:\n  enabled: true\nlog:\n  enabled: true\n');
    expect(loadNotificationConfig(path, {})).toEqual(DEFAULT_CONFIG);
  });
});
