import type { Logger } from 'pino';
import type { Alert, Notifier } from '../../domain/index.js';
import { toAlertJson } from '../../domain/index.js';

/** Writes each alert as a structured log line. Never fails. */
export class LogNotifier implements Notifier {
  private readonly log: Logger;

  constructor(log: Logger) {
    this.log = log;
  }

  async notify(alert: Alert): Promise<void> {
    this.log.info({ alert: toAlertJson(alert) }, `Alert: ${alert.title}`);
  }
}
