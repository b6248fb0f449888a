import { StaffRole } from '@shared/schema';
import type { MailSettings } from '../server/config';
import type { Sleep } from '../server/services/email-delivery';
import type { MailTransport, OutgoingEmail } from '../server/services/mail-transport';
import type { MemStorage } from './mem-storage';

export const mailSettings = (overrides: Partial<MailSettings> = {}): MailSettings => ({
  host: 'smtp.test.local',
  port: 587,
  user: 'mailer',
  password: 'test-secret',
  fromEmail: 'noreply@firm.test',
  fromName: 'Client Services',
  useTls: true,
  timeoutSeconds: 30,
  retryAttempts: 3,
  emailDelaySeconds: 0,
  ...overrides,
});

export const noSleep: Sleep = async () => {};

/**
 * Records every send. Recipients registered with `failFor` throw the queued
 * messages in order before they start succeeding.
 */
export class FakeTransport implements MailTransport {
  attempts: OutgoingEmail[] = [];
  sent: OutgoingEmail[] = [];
  private failures = new Map<string, string[]>();

  failFor(to: string, ...messages: string[]) {
    this.failures.set(to, messages);
  }

  async send(email: OutgoingEmail): Promise<void> {
    this.attempts.push(email);
    const failure = this.failures.get(email.to)?.shift();
    if (failure) {
      throw new Error(failure);
    }
    this.sent.push(email);
  }
}

export function seedFirm(storage: MemStorage) {
  const org = storage.addOrganization({ name: 'Acme Accounting', city: 'Pune', state: 'MH', country: 'India', pincode: '411001' });
  const admin = storage.addUser({
    email: 'admin@acme.test',
    orgId: org.id,
    role: StaffRole.ADMIN,
    fullName: 'Asha Admin',
    phone: '+91 90000 00000',
  });
  const client = storage.addClient({
    clientName: 'Ravi Kumar',
    companyName: 'Kumar Traders',
    email: 'ravi@kumar.test',
    orgId: org.id,
  });
  const template = storage.addTemplate({
    name: 'GST Reminder',
    category: 'reminder',
    type: 'gst_filing',
    subject: 'GST due for {{company_name}}',
    body: 'Dear {{client_name}},\nYour GST return is due on {{deadline_date}}.',
    orgId: org.id,
  });

  return { org, admin, client, template };
}
