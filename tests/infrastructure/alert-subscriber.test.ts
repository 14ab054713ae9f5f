import { describe, it, expect, vi, beforeEach } from 'vitest';
import { startAlertSubscriber } from '../../src/infrastructure/redis/alert-subscriber.js';
import type { SubscriberClient } from '../../src/infrastructure/redis/alert-subscriber.js';
import type { Alert } from '../../src/domain/index.js';
import { fakeLogger } from '../helpers.js';

type MessageListener = (channel: string, message: string) => void;

function fakeSubscriber() {
  const listeners: MessageListener[] = [];
  const client = {
    on: vi.fn((event: string, listener: MessageListener) => {
      if (event === 'message') listeners.push(listener);
    }),
    subscribe: vi.fn(async () => 1),
    unsubscribe: vi.fn(async () => 0),
    quit: vi.fn(async () => 'OK'),
  };
  const emit = (channel: string, message: string) => {
    for (const listener of listeners) listener(channel, message);
  };
  return { client, sub: client as unknown as SubscriberClient, emit };
}

const wireAlert = {
  id: 'alert-0001',
  version: 'v0',
  job_id: 'job-1',
  timestamp: '2024-01-02T03:04:05.5Z',
  title: 'disk full',
  description: '',
  attrs: { severity: 'critical' },
};

describe('startAlertSubscriber', () => {
  let log: ReturnType<typeof fakeLogger>;

  beforeEach(() => {
    log = fakeLogger();
  });

  it('subscribes to the channel', async () => {
    const { client, sub } = fakeSubscriber();
    await startAlertSubscriber(sub, log, () => undefined, 'ops');
    expect(client.subscribe).toHaveBeenCalledWith('ops');
  });

  it('decodes alerts and hands them to the handler', async () => {
    const { sub, emit } = fakeSubscriber();
    const received: Alert[] = [];
    await startAlertSubscriber(sub, log, (alert) => received.push(alert), 'ops');

    emit('ops', JSON.stringify(wireAlert));

    expect(received).toHaveLength(1);
    expect(received[0]?.timestamp).toEqual({ seconds: 1704164645, nanos: 500000000 });
    expect(received[0]?.attrs).toEqual({ severity: 'critical' });
  });

  it('ignores messages on other channels', async () => {
    const { sub, emit } = fakeSubscriber();
    const handler = vi.fn();
    await startAlertSubscriber(sub, log, handler, 'ops');

    emit('other', JSON.stringify(wireAlert));

    expect(handler).not.toHaveBeenCalled();
  });

  it('skips undecodable messages and unknown versions', async () => {
    const { sub, emit } = fakeSubscriber();
    const handler = vi.fn();
    await startAlertSubscriber(sub, log, handler, 'ops');

    emit('ops', 'not json');
    emit('ops', JSON.stringify({ ...wireAlert, version: 'v2' }));

    expect(handler).not.toHaveBeenCalled();
    expect(vi.mocked(log.warn)).toHaveBeenCalledTimes(2);
    expect(vi.mocked(log.warn)).toHaveBeenLastCalledWith(
      expect.objectContaining({ err: expect.objectContaining({ kind: 'UnsupportedAlertVersion' }) }),
      'Skipping undecodable alert message',
    );
  });

  it('unsubscribes and quits on cleanup', async () => {
    const { client, sub } = fakeSubscriber();
    const stop = await startAlertSubscriber(sub, log, () => undefined, 'ops');

    await stop();

    expect(client.unsubscribe).toHaveBeenCalledWith('ops');
    expect(client.quit).toHaveBeenCalledTimes(1);
  });
});
