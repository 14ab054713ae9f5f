import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';

/**
 * Notification channel configuration loaded from YAML.
 */
export interface NotificationConfig {
  log: { enabled: boolean };
  redis: { enabled: boolean; channel: string };
  slack: { enabled: boolean; webhook_url: string; channel: string };
}

/**
 * Default configuration: only the log channel is enabled.
 */
export const DEFAULT_CONFIG: NotificationConfig = {
  log: { enabled: true },
  redis: { enabled: false, channel: 'batchwatch_alerts' },
  slack: { enabled: false, webhook_url: '', channel: '' },
};

type Section = Record<string, string | boolean>;

/**
 * Minimal YAML reader for the flat notification config structure.
 *
 * Handles only the subset of YAML used in config/notifications.yaml:
 * top-level section keys with indented scalar values.
 * Not a general-purpose YAML parser.
 */
function parseSimpleYaml(content: string): Record<string, Section> {
  const result: Record<string, Section> = {};
  let currentSection: Section | undefined;

  for (const rawLine of content.split('\n')) {
    const line = rawLine.trimEnd();
    if (line.trim() === '' || line.trimStart().startsWith('#')) continue;

    const colonIdx = line.indexOf(':');
    if (colonIdx === -1) continue;

    // Top-level key (no leading whitespace)
    if (!line.startsWith(' ') && !line.startsWith('\t')) {
      currentSection = {};
      result[line.slice(0, colonIdx).trim()] = currentSection;
      continue;
    }

    if (currentSection === undefined) continue;

    const key = line.slice(0, colonIdx).trim();
    const value = line.slice(colonIdx + 1).trim();

    if (value === 'true') {
      currentSection[key] = true;
    } else if (value === 'false') {
      currentSection[key] = false;
    } else if (
      value.length >= 2 &&
      ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'")))
    ) {
      currentSection[key] = value.slice(1, -1);
    } else {
      currentSection[key] = value;
    }
  }

  return result;
}

function bool(section: Section, key: string, fallback: boolean): boolean {
  const value = section[key];
  return typeof value === 'boolean' ? value : fallback;
}

function str(section: Section, key: string, fallback: string): string {
  const value = section[key];
  return typeof value === 'string' ? value : fallback;
}

/**
 * Loads notification configuration from the YAML file.
 *
 * Falls back to DEFAULT_CONFIG if the file is missing or unreadable.
 * Merges loaded values over defaults so missing keys get default values.
 * Environment variables `SLACK_WEBHOOK_URL` fill an empty webhook URL so
 * the secret does not need to live in the file.
 */
export function loadNotificationConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env,
): NotificationConfig {
  const filePath = configPath ?? resolve(process.cwd(), 'config', 'notifications.yaml');

  let parsed: Record<string, Section>;
  try {
    parsed = parseSimpleYaml(readFileSync(filePath, 'utf-8'));
  } catch {
    return structuredClone(DEFAULT_CONFIG);
  }

  const log = parsed['log'] ?? {};
  const redis = parsed['redis'] ?? {};
  const slack = parsed['slack'] ?? {};

  const webhookUrl = str(slack, 'webhook_url', DEFAULT_CONFIG.slack.webhook_url);

  return {
    log: {
      enabled: bool(log, 'enabled', DEFAULT_CONFIG.log.enabled),
    },
    redis: {
      enabled: bool(redis, 'enabled', DEFAULT_CONFIG.redis.enabled),
      channel: str(redis, 'channel', DEFAULT_CONFIG.redis.channel) || DEFAULT_CONFIG.redis.channel,
    },
    slack: {
      enabled: bool(slack, 'enabled', DEFAULT_CONFIG.slack.enabled),
      webhook_url: webhookUrl || (env['SLACK_WEBHOOK_URL'] ?? ''),
      channel: str(slack, 'channel', DEFAULT_CONFIG.slack.channel),
    },
  };
}
