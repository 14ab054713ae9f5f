import { describe, it, expect } from 'vitest';
import { decodeAlert } from '../../src/application/alert-schema.js';
import { newAlert, sequentialIdGenerator, toAlertJson } from '../../src/domain/index.js';
import { FIXED_NOW } from '../helpers.js';

describe('decodeAlert', () => {
  const alert = newAlert(
    { jobId: 'job-1' },
    { title: 'disk full', timestamp: 1704165845.5, attrs: { host: 'db1' } },
    { ids: sequentialIdGenerator(), now: () => FIXED_NOW },
  );

  it('round-trips a published alert', () => {
    const wire: unknown = JSON.parse(JSON.stringify(toAlertJson(alert)));
    expect(decodeAlert(wire)).toEqual(alert);
  });

  it('rejects an unknown version', () => {
    expect(() => decodeAlert({ ...toAlertJson(alert), version: 'v9' })).toThrow(
      expect.objectContaining({
        kind: 'UnsupportedAlertVersion',
        context: { alert_id: 'alert-0001', version: 'v9', expected: 'v0' },
      }),
    );
  });

  it('rejects a malformed timestamp', () => {
    expect(() => decodeAlert({ ...toAlertJson(alert), timestamp: 'yesterday' })).toThrow(
      expect.objectContaining({ kind: 'MalformedTimestamp' }),
    );
  });

  it('detaches and freezes the decoded attrs', () => {
    const attrs = { host: { name: 'db1', ports: [5432] } };
    const decoded = decodeAlert({ ...toAlertJson(alert), attrs });
    attrs.host.name = 'db2';
    attrs.host.ports.push(5433);

    expect(decoded.attrs).toEqual({ host: { name: 'db1', ports: [5432] } });
    expect(Object.isFrozen(decoded.attrs)).toBe(true);
    expect(Object.isFrozen(decoded.attrs['host'])).toBe(true);
  });

  it('rejects attrs that are not dynamic values', () => {
    expect(() => decodeAlert({ ...toAlertJson(alert), attrs: { fn: undefined } })).toThrow(
      expect.objectContaining({ kind: 'InvalidAlertBody' }),
    );
  });

  it('rejects a missing id', () => {
    const wire: Record<string, unknown> = { ...toAlertJson(alert) };
    delete wire['id'];
    expect(() => decodeAlert(wire)).toThrow(expect.objectContaining({ kind: 'InvalidAlertBody' }));
  });
});
