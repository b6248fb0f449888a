import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { InsertScheduledEmail, ScheduledEmail } from '@shared/schema';
import { createCredentialCipher } from '../server/credentials';
import { EmailDelivery } from '../server/services/email-delivery';
import { SendPipeline } from '../server/services/send-pipeline';
import { LOGIN_URL_PLACEHOLDER } from '../server/services/template-renderer';
import { MemStorage } from './mem-storage';
import { FakeTransport, mailSettings, noSleep, seedFirm } from './test-utils';

const now = new Date(2025, 2, 10, 9, 0, 30);
const cipher = createCredentialCipher('test-secret');
const paragraph = (text: string) => `<p style="margin: 0 0 16px 0;">${text}</p>`;

describe('Send Pipeline', () => {
  let storage: MemStorage;
  let transport: FakeTransport;
  let firm: ReturnType<typeof seedFirm>;
  let pipeline: SendPipeline;

  const addRow = (overrides: Partial<InsertScheduledEmail> = {}) =>
    storage.addScheduledEmail({
      clientId: firm.client.id,
      templateId: firm.template.id,
      recipientEmails: ['a@x.test', 'b@x.test'],
      scheduledDate: '2025-03-10',
      scheduledTime: '09:00:00',
      scheduledDatetime: new Date(2025, 2, 10, 9, 0),
      ...overrides,
    });

  const run = (row: ScheduledEmail, mailConfigured = true) =>
    pipeline.process(row, storage, { now, mailConfigured });

  beforeEach(() => {
    storage = new MemStorage(() => now);
    firm = seedFirm(storage);
    transport = new FakeTransport();
    pipeline = new SendPipeline({
      delivery: new EmailDelivery(transport, mailSettings(), noSleep),
      cipher,
      frontendUrl: 'https://portal.acme.test/',
    });
  });

  it('should render the template and send it to every recipient', async () => {
    const outcome = await run(addRow());

    expect(outcome.row).toMatchObject({ status: 'sent', sentAt: now, errorMessage: null });
    expect(outcome.continuation).toBeNull();
    expect(transport.sent.map((email) => email.to)).toEqual(['a@x.test', 'b@x.test']);

    const [first] = transport.sent;
    expect(first.subject).toBe('GST due for Kumar Traders');
    expect(first.fromName).toBe('Acme Accounting');
    expect(first.html).toContain(`${paragraph('Dear Ravi Kumar,')}\n${paragraph('Your GST return is due on 2025-03-10.')}`);
  });

  it('should mark the row sent when only some recipients fail', async () => {
    transport.failFor('b@x.test', 'Invalid login: 535');
    const outcome = await run(addRow());

    expect(outcome.row.status).toBe('sent');
    expect(outcome.row.errorMessage).toBe('Error sending to b@x.test: Invalid login: 535');
  });

  it('should mark the row failed when every recipient fails', async () => {
    transport.failFor('a@x.test', '550 Mailbox unavailable');
    transport.failFor('b@x.test', '550 Mailbox unavailable');
    const row = addRow();
    const outcome = await run(row);

    expect(outcome.row.status).toBe('failed');
    expect(storage.scheduledEmail(row.id).errorMessage).toBe(
      'Error sending to a@x.test: 550 Mailbox unavailable; Error sending to b@x.test: 550 Mailbox unavailable',
    );
  });

  it('should record every recipient as unsent when mail is not configured', async () => {
    const outcome = await run(addRow(), false);

    expect(outcome.row.status).toBe('failed');
    expect(outcome.row.errorMessage).toBe(
      'Error sending to a@x.test: Email service not configured; Error sending to b@x.test: Email service not configured',
    );
    expect(transport.attempts).toHaveLength(0);
  });

  it('should fail rows whose references are gone', async () => {
    expect((await run(addRow({ templateId: 999 }))).row.errorMessage).toBe('Template not found');
    expect((await run(addRow({ templateId: null }))).row.errorMessage).toBe('Template not specified');
    expect((await run(addRow({ clientId: 999 }))).row.errorMessage).toBe('Client not found');
  });

  it('should fail a row without recipients', async () => {
    const outcome = await run(addRow({ recipientEmails: [] }));
    expect(outcome.row).toMatchObject({ status: 'failed', errorMessage: 'No recipients to send to' });
  });

  it('should schedule the next day of a recurring row', async () => {
    const outcome = await run(addRow({ isRecurring: true }));

    expect(outcome.continuation).toMatchObject({
      clientId: firm.client.id,
      templateId: firm.template.id,
      scheduledDate: '2025-03-11',
      scheduledTime: '09:00',
      status: 'pending',
      isRecurring: true,
    });
    expect(storage.state.scheduledEmails).toHaveLength(2);
  });

  it('should not schedule a continuation when the recurring row failed', async () => {
    transport.failFor('a@x.test', '550 Mailbox unavailable');
    const outcome = await run(addRow({ isRecurring: true, recipientEmails: ['a@x.test'] }));

    expect(outcome.continuation).toBeNull();
    expect(storage.state.scheduledEmails).toHaveLength(1);
  });

  it('should include login details, the first service and the organization contact', async () => {
    const portalUser = storage.addUser({
      email: 'portal@kumar.test',
      orgId: firm.org.id,
      role: 'client',
      encryptedPlainPassword: cipher.encrypt('test-password'),
    });
    const client = storage.addClient({ clientName: 'Meera', companyName: 'Meera Co', orgId: firm.org.id, userId: portalUser.id });
    storage.addService(client.id, { name: 'GST', description: 'Monthly GST filing' });
    storage.addService(client.id, { name: 'TDS', description: 'Quarterly TDS' });
    const template = storage.addTemplate({
      name: 'Portal Login',
      category: 'login',
      type: 'login_credentials',
      subject: 'Your login',
      body: 'Login: {{login_email}} / {{login_password}} at {{login_url}}\n{{service_description}} by {{org_email}}',
      orgId: firm.org.id,
    });

    await run(addRow({ clientId: client.id, templateId: template.id, recipientEmails: ['meera@x.test'] }));

    expect(transport.sent[0].html).toContain(
      `${paragraph('Login: portal@kumar.test / test-password at https://portal.acme.test/login')}\n${paragraph('Monthly GST filing by admin@acme.test')}`,
    );
  });

  it('should use the login link placeholder without a frontend URL', async () => {
    pipeline = new SendPipeline({ delivery: new EmailDelivery(transport, mailSettings(), noSleep), cipher });
    const template = storage.addTemplate({
      name: 'Link',
      category: 'login',
      type: 'login_credentials',
      subject: 'Link',
      body: '{{login_url}}',
      orgId: firm.org.id,
    });

    await run(addRow({ templateId: template.id, recipientEmails: ['a@x.test'] }));
    expect(transport.sent[0].html).toContain(paragraph(LOGIN_URL_PLACEHOLDER));
  });

  it('should pause between recipients', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    pipeline = new SendPipeline({
      delivery: new EmailDelivery(transport, mailSettings({ emailDelaySeconds: 2 }), sleep),
      cipher,
    });

    await run(addRow({ recipientEmails: ['a@x.test', 'b@x.test', 'c@x.test'] }));
    expect(sleep.mock.calls).toEqual([[2000], [2000]]);
  });
});
