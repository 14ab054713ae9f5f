export { loadNotificationConfig, DEFAULT_CONFIG } from './config.js';
export type { NotificationConfig } from './config.js';
export { SlackNotifier, formatSlackMessage } from './slack.js';
export { LogNotifier } from './log.js';
export { NotificationDispatcher, createNotificationDispatcher } from './dispatcher.js';
export type { NotificationChannel, DispatcherDeps } from './dispatcher.js';
