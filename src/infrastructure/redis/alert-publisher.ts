import type { Redis } from 'ioredis';
import type { Logger } from 'pino';
import type { Alert, Notifier } from '../../domain/index.js';
import { toAlertJson } from '../../domain/index.js';

export const DEFAULT_ALERT_CHANNEL = 'batchwatch_alerts';

/**
 * Publishes alerts as JSON on a Redis Pub/Sub channel.
 *
 * Publish errors propagate so the Eval batch records them.
 */
export class RedisAlertPublisher implements Notifier {
  private readonly redis: Pick<Redis, 'publish'>;
  private readonly log: Logger;
  private readonly channel: string;

  constructor(redis: Pick<Redis, 'publish'>, log: Logger, channel: string = DEFAULT_ALERT_CHANNEL) {
    this.redis = redis;
    this.log = log;
    this.channel = channel;
  }

  async notify(alert: Alert): Promise<void> {
    const receivers = await this.redis.publish(this.channel, JSON.stringify(toAlertJson(alert)));
    this.log.debug(
      { channel: this.channel, alert_id: alert.id, receivers },
      'Alert published',
    );
  }
}
