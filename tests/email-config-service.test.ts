import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { EmailConfigData, ServiceConfig } from '@shared/schema';
import { BadRequestError, ConfigValidationError, ForbiddenError, NotFoundError } from '../server/errors';
import { EmailConfigService } from '../server/services/email-config-service';
import { MemStorage } from './mem-storage';
import { seedFirm } from './test-utils';

const now = new Date(2025, 2, 1, 8, 0);

describe('Email Config Service', () => {
  let storage: MemStorage;
  let firm: ReturnType<typeof seedFirm>;
  let service: EmailConfigService;

  const gst = (overrides: Partial<ServiceConfig> = {}): ServiceConfig => ({
    enabled: true,
    templateId: firm.template.id,
    templateName: 'GST Reminder',
    dateType: 'range',
    scheduledDate: null,
    scheduledDateFrom: '2025-03-10',
    scheduledDateTo: '2025-03-12',
    scheduledTimes: ['09:00', '15:00'],
    ...overrides,
  });

  const configWith = (services: Record<string, ServiceConfig>): EmailConfigData => ({
    emails: ['a@x.test', 'b@x.test'],
    emailTemplates: {
      'a@x.test': { email: 'a@x.test', selectedTemplates: [firm.template.id] },
      'b@x.test': { email: 'b@x.test', selectedTemplates: [firm.template.id] },
    },
    services,
  });

  const rowsWithStatus = (status: string) => storage.state.scheduledEmails.filter((row) => row.status === status);

  beforeEach(() => {
    storage = new MemStorage(() => now);
    firm = seedFirm(storage);
    service = new EmailConfigService(storage, () => now);
  });

  describe('configuration', () => {
    it('should save the configuration and expand it into pending rows', async () => {
      const response = await service.createConfig(firm.client.id, firm.org.id, configWith({ gst: gst() }));

      expect(response).toMatchObject({ clientId: firm.client.id, emails: ['a@x.test', 'b@x.test'], createdAt: now });
      expect(rowsWithStatus('pending')).toHaveLength(6);
      expect(storage.state.scheduledEmails[0].recipientEmails).toEqual(['a@x.test', 'b@x.test']);
    });

    it('should refuse a second configuration for the same client', async () => {
      await service.createConfig(firm.client.id, firm.org.id, configWith({ gst: gst() }));
      await expect(service.createConfig(firm.client.id, firm.org.id, configWith({}))).rejects.toThrow(
        'Email configuration already exists. Use PUT to update.',
      );
    });

    it('should hide clients of other organizations', async () => {
      await expect(service.createConfig(firm.client.id, 999, configWith({}))).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should write nothing when validation fails', async () => {
      const attempt = service.createConfig(firm.client.id, firm.org.id, configWith({ gst: gst({ scheduledDateFrom: '2025-02-01' }) }));

      await expect(attempt).rejects.toBeInstanceOf(ConfigValidationError);
      await expect(attempt).rejects.toMatchObject({
        status: 422,
        errors: { 'services.gst': ['scheduledDateFrom cannot be in the past (must be today or later)'] },
      });
      expect(storage.state.configs).toHaveLength(0);
      expect(storage.state.scheduledEmails).toHaveLength(0);
    });

    it('should cancel pending rows when the configuration is replaced', async () => {
      await service.createConfig(firm.client.id, firm.org.id, configWith({ gst: gst() }));

      const response = await service.replaceConfig(
        firm.client.id,
        firm.org.id,
        configWith({ gst: gst({ dateType: 'single', scheduledDate: '2025-03-05', scheduledDateFrom: null, scheduledDateTo: null, scheduledTimes: ['10:00'] }) }),
      );

      expect(response.services.gst.dateType).toBe('single');
      expect(rowsWithStatus('cancelled')).toHaveLength(6);
      expect(rowsWithStatus('pending').map((row) => `${row.scheduledDate} ${row.scheduledTime}`)).toEqual([
        '2025-03-05 10:00',
      ]);
    });

    it('should create the configuration when replacing one that does not exist', async () => {
      await service.replaceConfig(firm.client.id, firm.org.id, configWith({ gst: gst() }));

      expect(storage.state.configs).toHaveLength(1);
      expect(rowsWithStatus('pending')).toHaveLength(6);
    });

    it('should leave the previous configuration in place when the replacement cannot be saved', async () => {
      await service.createConfig(firm.client.id, firm.org.id, configWith({ gst: gst() }));
      vi.spyOn(storage, 'createScheduledEmails').mockRejectedValueOnce(new Error('db down'));

      await expect(
        service.replaceConfig(firm.client.id, firm.org.id, configWith({ gst: gst({ scheduledTimes: ['11:00'] }) })),
      ).rejects.toThrow('db down');

      expect(rowsWithStatus('pending')).toHaveLength(6);
      expect((await service.getConfig(firm.client.id, firm.org.id)).services.gst.scheduledTimes).toEqual(['09:00', '15:00']);
    });

    it('should cancel pending rows and remove the configuration on delete', async () => {
      await service.createConfig(firm.client.id, firm.org.id, configWith({ gst: gst() }));
      await service.deleteConfig(firm.client.id, firm.org.id);

      expect(rowsWithStatus('cancelled')).toHaveLength(6);
      await expect(service.getConfig(firm.client.id, firm.org.id)).rejects.toThrow('Email configuration not found');
    });
  });

  describe('recipients', () => {
    beforeEach(async () => {
      await service.createConfig(firm.client.id, firm.org.id, configWith({ gst: gst() }));
    });

    it('should list configured recipients', async () => {
      expect(await service.listRecipients(firm.client.id, firm.org.id)).toEqual({
        emails: [
          { email: 'a@x.test', selectedTemplates: [firm.template.id] },
          { email: 'b@x.test', selectedTemplates: [firm.template.id] },
        ],
        total: 2,
      });
    });

    it('should add a recipient to the address list', async () => {
      await service.addRecipient(firm.client.id, firm.org.id, { email: 'c@x.test', selectedTemplates: [firm.template.id] });

      const config = await service.getConfig(firm.client.id, firm.org.id);
      expect(config.emails).toEqual(['a@x.test', 'b@x.test', 'c@x.test']);
      expect(await service.getRecipient(firm.client.id, firm.org.id, 'c@x.test')).toEqual({
        email: 'c@x.test',
        selectedTemplates: [firm.template.id],
      });
    });

    it('should reject duplicate recipients and unusable templates', async () => {
      await expect(
        service.addRecipient(firm.client.id, firm.org.id, { email: 'a@x.test', selectedTemplates: [] }),
      ).rejects.toThrow("Email 'a@x.test' already exists in configuration");

      await expect(
        service.addRecipient(firm.client.id, firm.org.id, { email: 'c@x.test', selectedTemplates: [999] }),
      ).rejects.toThrow('Invalid template IDs: [999]');

      const other = storage.addOrganization({ name: 'Other Firm' });
      const foreign = storage.addTemplate({
        name: 'Foreign',
        category: 'reminder',
        type: 'other',
        subject: 'S',
        body: 'B',
        orgId: other.id,
      });
      const attempt = service.updateRecipient(firm.client.id, firm.org.id, 'a@x.test', [foreign.id]);
      await expect(attempt).rejects.toBeInstanceOf(ForbiddenError);
      await expect(attempt).rejects.toThrow(`Template ID ${foreign.id} does not belong to your organization`);
    });

    it('should report unknown recipients', async () => {
      await expect(service.updateRecipient(firm.client.id, firm.org.id, 'z@x.test', [])).rejects.toThrow(
        "Email 'z@x.test' not found in configuration",
      );
    });

    it('should strip a removed recipient from pending rows and cancel rows left empty', async () => {
      expect(await service.removeRecipient(firm.client.id, firm.org.id, 'a@x.test')).toEqual({
        message: "Email 'a@x.test' successfully removed from configuration",
      });
      expect(rowsWithStatus('pending').every((row) => row.recipientEmails.join() === 'b@x.test')).toBe(true);
      expect((await service.getConfig(firm.client.id, firm.org.id)).emails).toEqual(['b@x.test']);

      await service.removeRecipient(firm.client.id, firm.org.id, 'b@x.test');
      expect(rowsWithStatus('pending')).toHaveLength(0);
      expect(rowsWithStatus('cancelled')).toHaveLength(6);
    });
  });

  describe('scheduled emails', () => {
    const addRow = (status: 'pending' | 'sent' | 'failed', clientId = firm.client.id) =>
      storage.addScheduledEmail({
        clientId,
        templateId: firm.template.id,
        recipientEmails: ['a@x.test'],
        scheduledDate: '2025-03-02',
        scheduledTime: '09:00:00',
        scheduledDatetime: new Date(2025, 2, 2, 9, 0),
        status,
        errorMessage: status === 'failed' ? 'Error sending to a@x.test: 550' : null,
      });

    it('should page through rows newest first with the template name', async () => {
      await service.createConfig(firm.client.id, firm.org.id, configWith({ gst: gst() }));

      const page = await service.listScheduledEmails(firm.client.id, firm.org.id, { limit: 2, skip: 0 });
      expect(page.total).toBe(6);
      expect(page.scheduledEmails.map((row) => `${row.scheduledDate} ${row.scheduledTime} ${row.templateName}`)).toEqual([
        '2025-03-12 15:00 GST Reminder',
        '2025-03-12 09:00 GST Reminder',
      ]);

      expect((await service.listScheduledEmails(firm.client.id, firm.org.id, { status: 'sent', limit: 10, skip: 0 })).total).toBe(0);
    });

    it('should cancel only pending rows', async () => {
      const pending = addRow('pending');
      const sent = addRow('sent');

      await service.cancelScheduledEmail(firm.client.id, firm.org.id, pending.id);
      await service.cancelScheduledEmail(firm.client.id, firm.org.id, sent.id);

      expect(storage.scheduledEmail(pending.id).status).toBe('cancelled');
      expect(storage.scheduledEmail(sent.id).status).toBe('sent');
    });

    it('should not reach rows of another client', async () => {
      const otherClient = storage.addClient({ clientName: 'Other', orgId: firm.org.id });
      const row = addRow('pending', otherClient.id);

      await expect(service.cancelScheduledEmail(firm.client.id, firm.org.id, row.id)).rejects.toThrow(
        'Scheduled email not found',
      );
    });

    it('should requeue failed rows only', async () => {
      const failed = addRow('failed');
      const pending = addRow('pending');

      expect(await service.retryScheduledEmail(firm.client.id, firm.org.id, failed.id)).toEqual({
        message: 'Email scheduled for retry',
      });
      expect(storage.scheduledEmail(failed.id)).toMatchObject({ status: 'pending', errorMessage: null });

      const attempt = service.retryScheduledEmail(firm.client.id, firm.org.id, pending.id);
      await expect(attempt).rejects.toBeInstanceOf(BadRequestError);
      await expect(attempt).rejects.toThrow('Can only retry failed emails');
    });

    it('should schedule a one-off email a number of seconds from now', async () => {
      const row = await service.scheduleAdHoc(firm.org.id, {
        clientId: firm.client.id,
        templateId: firm.template.id,
        recipientEmails: ['a@x.test'],
        sendInSeconds: 90,
      });

      expect(row).toMatchObject({
        scheduledDate: '2025-03-01',
        scheduledTime: '08:01',
        status: 'pending',
        isRecurring: false,
        recipientEmails: ['a@x.test'],
      });
      expect(row.scheduledDatetime).toEqual(new Date(2025, 2, 1, 8, 1, 30));
    });

    it('should not schedule a template of another organization', async () => {
      const other = storage.addOrganization({ name: 'Other Firm' });
      const foreign = storage.addTemplate({
        name: 'Foreign',
        category: 'reminder',
        type: 'other',
        subject: 'S',
        body: 'B',
        orgId: other.id,
      });

      await expect(
        service.scheduleAdHoc(firm.org.id, {
          clientId: firm.client.id,
          templateId: foreign.id,
          recipientEmails: ['a@x.test'],
          sendInSeconds: 0,
        }),
      ).rejects.toThrow('Template not found');
    });
  });
});
