import { describe, it, expect, vi, beforeEach } from 'vitest';
import { EMAIL_NOT_CONFIGURED, EmailDelivery, isRetryableError } from '../server/services/email-delivery';
import { FakeTransport, mailSettings } from './test-utils';

const email = { to: 'a@x.test', subject: 'Hello', html: '<p>Hi</p>' };

describe('Email Delivery - Retries', () => {
  let transport: FakeTransport;
  const sleep = vi.fn(async (_ms: number) => {});

  beforeEach(() => {
    transport = new FakeTransport();
    sleep.mockClear();
  });

  it('should send on the first attempt without waiting', async () => {
    const delivery = new EmailDelivery(transport, mailSettings(), sleep);

    expect(await delivery.deliver(email)).toEqual({ success: true });
    expect(transport.attempts).toHaveLength(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('should retry transient failures with growing backoff', async () => {
    transport.failFor('a@x.test', 'Connection timeout', 'Greeting never received: timed out');
    const delivery = new EmailDelivery(transport, mailSettings(), sleep);

    expect(await delivery.deliver(email)).toEqual({ success: true });
    expect(transport.attempts).toHaveLength(3);
    expect(sleep.mock.calls).toEqual([[2000], [4000]]);
  });

  it('should give up after the configured number of attempts', async () => {
    transport.failFor('a@x.test', 'ECONNRESET one', 'ECONNRESET two', 'ECONNRESET three');
    const delivery = new EmailDelivery(transport, mailSettings({ retryAttempts: 3 }), sleep);

    expect(await delivery.deliver(email)).toEqual({ success: false, error: 'ECONNRESET three' });
    expect(transport.attempts).toHaveLength(3);
    expect(sleep.mock.calls).toEqual([[2000], [4000]]);
  });

  it('should not retry permanent failures', async () => {
    transport.failFor('a@x.test', 'Invalid login: 535 Authentication failed');
    const delivery = new EmailDelivery(transport, mailSettings(), sleep);

    expect(await delivery.deliver(email)).toEqual({
      success: false,
      error: 'Invalid login: 535 Authentication failed',
    });
    expect(transport.attempts).toHaveLength(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('should refuse to send without SMTP settings', async () => {
    const delivery = new EmailDelivery(transport, mailSettings({ host: undefined, fromEmail: undefined }), sleep);

    expect(await delivery.deliver(email)).toEqual({ success: false, error: EMAIL_NOT_CONFIGURED });
    expect(delivery.isConfigured()).toBe(false);
    expect(delivery.missingSettings()).toEqual(['SMTP_HOST', 'SMTP_FROM_EMAIL']);
    expect(transport.attempts).toHaveLength(0);
  });

  it('should expose the per-recipient delay in milliseconds', () => {
    expect(new EmailDelivery(transport, mailSettings({ emailDelaySeconds: 1.5 })).emailDelayMs).toBe(1500);
  });
});

describe('Email Delivery - Error classification', () => {
  it('should treat network problems as transient', () => {
    expect(isRetryableError('Connection closed unexpectedly')).toBe(true);
    expect(isRetryableError('connect ECONNREFUSED 127.0.0.1:587')).toBe(true);
    expect(isRetryableError('421 Temporary local problem')).toBe(true);
  });

  it('should treat rejections as permanent', () => {
    expect(isRetryableError('550 Mailbox unavailable')).toBe(false);
    expect(isRetryableError('Invalid login: 535')).toBe(false);
  });
});
