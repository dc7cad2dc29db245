import { describe, it, expect } from 'vitest';
import { NotificationManager } from '@worker/notifications/notification-manager';
import { FakeNotifier } from '../../helpers/fake-notifier';
import { makeAnomaly, makeRun } from '../../fixtures/runs';

const DASHBOARD = 'http://localhost:8080';

describe('NotificationManager', () => {
  it('sends to every configured channel', async () => {
    const a = new FakeNotifier('a');
    const b = new FakeNotifier('b');
    const off = new FakeNotifier('off', false);
    const manager = new NotificationManager([a, b, off], DASHBOARD);

    const results = await manager.sendFailureAlert(
      makeRun(1, { status: 'failure' }),
      makeAnomaly(1, 'high'),
    );

    expect(results).toEqual([
      { success: true, channel: 'a' },
      { success: true, channel: 'b' },
    ]);
    expect(a.sent[0].subject).toBe('🚨 Pipeline Failure Alert - Run #run-1');
    expect(off.sent).toEqual([]);
  });

  it('returns no results without a configured channel', async () => {
    const manager = new NotificationManager([new FakeNotifier('off', false)], DASHBOARD);
    expect(manager.hasConfiguredChannel).toBe(false);
    await expect(manager.sendTestAlert()).resolves.toEqual([]);
  });

  it('reports a throwing channel as failed', async () => {
    const broken = new FakeNotifier('broken', true, 'connection reset');
    const ok = new FakeNotifier('ok');
    const manager = new NotificationManager([broken, ok], DASHBOARD);

    await expect(manager.sendTestAlert()).resolves.toEqual([
      { success: false, channel: 'broken', error: 'connection reset' },
      { success: true, channel: 'ok' },
    ]);
  });

  it('sends a canned test alert', async () => {
    const notifier = new FakeNotifier();
    await new NotificationManager([notifier], DASHBOARD).sendTestAlert();

    const lines = notifier.sent[0].body.split('\n');
    expect(notifier.sent[0].subject).toBe('🚨 Pipeline Failure Alert - Run #test-123');
    expect(lines).toContain('- Duration: 85 seconds');
    expect(lines).toContain('- Issue: Test notification');
    expect(lines).toContain('- Severity: low');
  });
});
