export { createRedis } from './client.js';
export { RedisAlertPublisher, DEFAULT_ALERT_CHANNEL } from './alert-publisher.js';
export { startAlertSubscriber } from './alert-subscriber.js';
export type { AlertHandler, SubscriberClient } from './alert-subscriber.js';
