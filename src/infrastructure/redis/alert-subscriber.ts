import type { Redis } from 'ioredis';
import type { Logger } from 'pino';
import type { Alert } from '../../domain/index.js';
import { decodeAlert } from '../../application/alert-schema.js';
import { DEFAULT_ALERT_CHANNEL } from './alert-publisher.js';

export type AlertHandler = (alert: Alert) => void;

/** The subset of a subscriber-mode connection this module drives. */
export type SubscriberClient = Pick<Redis, 'on' | 'subscribe' | 'unsubscribe' | 'quit'>;

/**
 * Subscribes to the alert channel on a dedicated connection.
 *
 * ioredis requires a dedicated connection for subscriber mode.
 * Messages are decoded with the alert wire schema; malformed payloads and
 * unknown schema versions are logged and skipped.
 *
 * Returns a cleanup function for graceful shutdown.
 */
export async function startAlertSubscriber(
  sub: SubscriberClient,
  log: Logger,
  handler: AlertHandler,
  channel: string = DEFAULT_ALERT_CHANNEL,
): Promise<() => Promise<void>> {
  sub.on('message', (received: string, message: string) => {
    if (received !== channel) return;

    let alert: Alert;
    try {
      alert = decodeAlert(JSON.parse(message));
    } catch (err: unknown) {
      log.warn({ err, message }, 'Skipping undecodable alert message');
      return;
    }

    log.debug({ alert_id: alert.id, job_id: alert.job_id }, 'Alert received');
    handler(alert);
  });

  await sub.subscribe(channel);
  log.info({ channel }, 'Subscribed to alerts');

  return async () => {
    await sub.unsubscribe(channel);
    await sub.quit();
    log.info('Alert subscriber disconnected');
  };
}
