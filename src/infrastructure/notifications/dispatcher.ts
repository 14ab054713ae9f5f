import type { Redis } from 'ioredis';
import type { Logger } from 'pino';
import type { Alert, Notifier } from '../../domain/index.js';
import { PipelineError, describeError } from '../../domain/index.js';
import type { NotificationConfig } from './config.js';
import { LogNotifier } from './log.js';
import { SlackNotifier } from './slack.js';
import { RedisAlertPublisher } from '../redis/alert-publisher.js';

export interface NotificationChannel {
  readonly name: string;
  readonly notifier: Notifier;
}

/**
 * Dispatches an alert to every configured channel.
 *
 * Channels run independently; one failing channel does not stop the
 * others. If any channel fails, the dispatch rejects naming the failed channels.
 */
export class NotificationDispatcher implements Notifier {
  private readonly channels: readonly NotificationChannel[];
  private readonly log: Logger;

  constructor(channels: readonly NotificationChannel[], log: Logger) {
    this.channels = channels;
    this.log = log;
  }

  async notify(alert: Alert, signal?: AbortSignal): Promise<void> {
    const results = await Promise.allSettled(
      this.channels.map((channel) => channel.notifier.notify(alert, signal)),
    );

    const failed: string[] = [];
    const errors: unknown[] = [];

    results.forEach((result, index) => {
      if (result.status === 'fulfilled') return;
      const name = this.channels[index]?.name ?? `#${index}`;
      this.log.warn({ err: result.reason, channel: name, alert_id: alert.id }, 'Channel dispatch failed');
      failed.push(name);
      errors.push(result.reason);
    });

    if (failed.length > 0) {
      throw new AggregateError(
        errors,
        `notification failed on ${failed.join(', ')}: ${errors.map(describeError).join('; ')}`,
      );
    }
  }

  get channelNames(): string[] {
    return this.channels.map((c) => c.name);
  }
}

export interface DispatcherDeps {
  readonly log: Logger;
  /** Required when the redis channel is enabled. */
  readonly redis?: Pick<Redis, 'publish'> | undefined;
  readonly fetchFn?: typeof fetch | undefined;
}

/** Builds the dispatcher for every enabled channel in `config`. */
export function createNotificationDispatcher(
  config: NotificationConfig,
  deps: DispatcherDeps,
): NotificationDispatcher {
  const channels: NotificationChannel[] = [];

  if (config.log.enabled) {
    channels.push({ name: 'log', notifier: new LogNotifier(deps.log) });
  }

  if (config.redis.enabled) {
    if (deps.redis === undefined) {
      throw new PipelineError('InvalidConfig', 'redis channel enabled but no redis connection configured');
    }
    channels.push({
      name: 'redis',
      notifier: new RedisAlertPublisher(deps.redis, deps.log, config.redis.channel),
    });
  }

  if (config.slack.enabled) {
    if (config.slack.webhook_url === '') {
      throw new PipelineError('InvalidConfig', 'slack channel enabled but webhook_url is empty');
    }
    channels.push({
      name: 'slack',
      notifier: new SlackNotifier(config.slack, deps.log, deps.fetchFn ?? fetch),
    });
  }

  if (channels.length === 0) {
    throw new PipelineError('InvalidConfig', 'no notification channel enabled');
  }

  return new NotificationDispatcher(channels, deps.log);
}
