import type {
  CreateEmailTemplateRequest,
  CustomizeTemplateRequest,
  EmailTemplate,
  EmailTemplateCategory,
  EmailTemplateTypeValue,
  UpdateEmailTemplateRequest,
} from "@shared/schema";
import { BadRequestError, ForbiddenError, NotFoundError } from "../errors";
import type { IStorage } from "../storage";

export interface TemplateListFilters {
  category?: EmailTemplateCategory;
  type?: EmailTemplateTypeValue;
  search?: string;
  skip: number;
  limit: number;
}

export interface TemplateListResponse {
  templates: EmailTemplate[];
  total: number;
  skip: number;
  limit: number;
}

export function isMasterTemplate(template: EmailTemplate): boolean {
  return template.isDefault && template.orgId === null;
}

function applyFilters(templates: EmailTemplate[], filters: TemplateListFilters): TemplateListResponse {
  const search = filters.search?.trim().toLowerCase();
  const matching = templates.filter(
    (template) =>
      (!filters.category || template.category === filters.category) &&
      (!filters.type || template.type === filters.type) &&
      (!search || template.name.toLowerCase().includes(search) || template.subject.toLowerCase().includes(search)),
  );

  return {
    templates: matching.slice(filters.skip, filters.skip + filters.limit),
    total: matching.length,
    skip: filters.skip,
    limit: filters.limit,
  };
}

export class EmailTemplateService {
  constructor(private readonly storage: IStorage) {}

  /** Templates an organization can use: its own plus every master. */
  async listVisible(orgId: number, filters: TemplateListFilters): Promise<TemplateListResponse> {
    return applyFilters(await this.storage.getVisibleEmailTemplates(orgId), filters);
  }

  async listMasters(filters: TemplateListFilters): Promise<TemplateListResponse> {
    return applyFilters(await this.storage.getMasterEmailTemplates(), filters);
  }

  async getVisible(id: number, orgId: number): Promise<EmailTemplate> {
    const template = await this.storage.getEmailTemplate(id);
    if (!template || (template.orgId !== orgId && !isMasterTemplate(template))) {
      throw new NotFoundError(`Template with id ${id} not found in your organization`);
    }
    return template;
  }

  private async getOwned(id: number, orgId: number, action: "updated" | "deleted"): Promise<EmailTemplate> {
    const template = await this.storage.getEmailTemplate(id);
    if (template && isMasterTemplate(template)) {
      throw new ForbiddenError("Master templates cannot be changed here. Customize the template instead.");
    }
    if (!template || template.orgId !== orgId) {
      throw new NotFoundError(`Template with id ${id} not found or cannot be ${action}`);
    }
    return template;
  }

  async createOrgTemplate(orgId: number, userId: number, input: CreateEmailTemplateRequest): Promise<EmailTemplate> {
    if (await this.storage.getOrgEmailTemplateByName(orgId, input.name)) {
      throw new BadRequestError("Template with this name already exists in your organization");
    }

    return this.storage.createEmailTemplate({
      name: input.name,
      category: input.category,
      type: input.type,
      subject: input.subject,
      body: input.body,
      variables: input.variables ?? null,
      isDefault: false,
      orgId,
      createdBy: userId,
    });
  }

  async updateOrgTemplate(id: number, orgId: number, input: UpdateEmailTemplateRequest): Promise<EmailTemplate> {
    const template = await this.getOwned(id, orgId, "updated");

    if (input.name && input.name !== template.name) {
      const clash = await this.storage.getOrgEmailTemplateByName(orgId, input.name);
      if (clash && clash.id !== template.id) {
        throw new BadRequestError("Template with this name already exists in your organization");
      }
    }

    return this.storage.updateEmailTemplate(template.id, input);
  }

  async deleteOrgTemplate(id: number, orgId: number): Promise<void> {
    const template = await this.getOwned(id, orgId, "deleted");
    await this.storage.deleteEmailTemplate(template.id);
  }

  /**
   * Gives the organization its own copy of a master template, or updates the
   * copy it already has.
   */
  async customizeMaster(
    masterId: number,
    orgId: number,
    userId: number,
    input: CustomizeTemplateRequest,
  ): Promise<{ template: EmailTemplate; created: boolean }> {
    const master = await this.storage.getEmailTemplate(masterId);
    if (!master || !isMasterTemplate(master)) {
      throw new NotFoundError(`Master template with id ${masterId} not found`);
    }

    const existing = await this.storage.getOrgCustomization(orgId, masterId);
    if (existing) {
      const template = await this.storage.updateEmailTemplate(existing.id, {
        ...(input.subject !== undefined ? { subject: input.subject } : {}),
        ...(input.body !== undefined ? { body: input.body } : {}),
      });
      return { template, created: false };
    }

    const template = await this.storage.createEmailTemplate({
      name: master.name,
      category: master.category,
      type: master.type,
      subject: input.subject || master.subject,
      body: input.body || master.body,
      isDefault: false,
      orgId,
      masterTemplateId: master.id,
      variables: master.variables,
      createdBy: userId,
    });
    return { template, created: true };
  }

  async getMaster(id: number): Promise<EmailTemplate> {
    const master = await this.storage.getEmailTemplate(id);
    if (!master || !isMasterTemplate(master)) {
      throw new NotFoundError(`Master template with id ${id} not found`);
    }
    return master;
  }

  async createMaster(userId: number, input: CreateEmailTemplateRequest): Promise<EmailTemplate> {
    if (await this.storage.getMasterEmailTemplateByName(input.name)) {
      throw new BadRequestError("Template with this name already exists");
    }

    return this.storage.createEmailTemplate({
      name: input.name,
      category: input.category,
      type: input.type,
      subject: input.subject,
      body: input.body,
      variables: input.variables ?? null,
      isDefault: true,
      orgId: null,
      masterTemplateId: null,
      createdBy: userId,
    });
  }

  /**
   * Edits the shared master. Organizations that already customized it keep their copies.
   */
  async updateMaster(id: number, input: UpdateEmailTemplateRequest): Promise<EmailTemplate> {
    const master = await this.getMaster(id);

    if (input.name && input.name !== master.name) {
      const clash = await this.storage.getMasterEmailTemplateByName(input.name);
      if (clash && clash.id !== master.id) {
        throw new BadRequestError("Template with this name already exists");
      }
    }

    return this.storage.updateEmailTemplate(master.id, input);
  }

  async deleteMaster(id: number): Promise<void> {
    const master = await this.getMaster(id);

    const customized = await this.storage.countTemplateCustomizations(id);
    if (customized > 0) {
      throw new BadRequestError(
        `Cannot delete master template. ${customized} organization(s) have customized versions. Please notify them first.`,
      );
    }

    await this.storage.deleteEmailTemplate(id);
  }
}
