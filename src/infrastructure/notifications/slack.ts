import type { Logger } from 'pino';
import type { Alert, Notifier } from '../../domain/index.js';
import { formatRfc3339 } from '../../domain/index.js';
import type { NotificationConfig } from './config.js';

type FetchFn = typeof fetch;

/** Slack message text for an alert. */
export function formatSlackMessage(alert: Alert): string {
  const severity = typeof alert.attrs['severity'] === 'string' ? alert.attrs['severity'] : 'alert';
  const lines = [`*[${severity.toUpperCase()}]* ${alert.title}`];
  if (alert.description !== '') {
    lines.push(`>${alert.description}`);
  }
  lines.push(`Job: \`${alert.job_id}\` | Alert: \`${alert.id}\` | At: ${formatRfc3339(alert.timestamp)}`);
  return lines.join('\n');
}

/**
 * Posts alerts to a Slack incoming webhook.
 * A non-2xx response rejects.
 */
export class SlackNotifier implements Notifier {
  private readonly config: NotificationConfig['slack'];
  private readonly log: Logger;
  private readonly fetchFn: FetchFn;

  constructor(config: NotificationConfig['slack'], log: Logger, fetchFn: FetchFn = fetch) {
    this.config = config;
    this.log = log;
    this.fetchFn = fetchFn;
  }

  async notify(alert: Alert, signal?: AbortSignal): Promise<void> {
    const body: Record<string, string> = { text: formatSlackMessage(alert) };
    if (this.config.channel !== '') {
      body['channel'] = this.config.channel;
    }

    const init: RequestInit = {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    };
    if (signal !== undefined) init.signal = signal;

    const response = await this.fetchFn(this.config.webhook_url, init);

    if (!response.ok) {
      throw new Error(`Slack webhook returned status ${response.status}`);
    }

    this.log.debug({ alert_id: alert.id }, 'Slack notification sent');
  }
}
