import { AppDataSource } from '../config/data-source';
import { APP_SETTINGS_ID, AppSettings } from '../models/app-settings.model';
import { PromptTemplate } from '../models/prompt-template.model';
import { HttpError } from '../utils/http';
import { isUniqueViolation } from '../utils/db-errors';
import { logger } from '../utils/logger';

export interface TemplatePayload {
  name: string;
  content: string;
}

export interface TemplateSummary {
  id: number;
  name: string;
}

export const DUPLICATE_TEMPLATE_MESSAGE = 'A template with this name already exists';

function rethrowDuplicate(error: unknown): never {
  if (isUniqueViolation(error)) {
    throw new HttpError(409, DUPLICATE_TEMPLATE_MESSAGE);
  }
  throw error;
}

export class PromptTemplateService {
  private readonly templateRepo = AppDataSource.getRepository(PromptTemplate);

  async list(): Promise<TemplateSummary[]> {
    return this.templateRepo.find({
      select: { id: true, name: true },
      order: { name: 'ASC' },
    });
  }

  async get(id: number): Promise<PromptTemplate | null> {
    return this.templateRepo.findOne({ where: { id } });
  }

  async getOrFail(id: number): Promise<PromptTemplate> {
    const template = await this.get(id);
    if (!template) {
      throw new HttpError(404, 'Template not found');
    }
    return template;
  }

  async create(payload: TemplatePayload): Promise<PromptTemplate> {
    try {
      const template = this.templateRepo.create({ name: payload.name, content: payload.content });
      return await this.templateRepo.save(template);
    } catch (error) {
      return rethrowDuplicate(error);
    }
  }

  async update(id: number, payload: TemplatePayload): Promise<PromptTemplate> {
    const template = await this.getOrFail(id);
    template.name = payload.name;
    template.content = payload.content;
    try {
      return await this.templateRepo.save(template);
    } catch (error) {
      return rethrowDuplicate(error);
    }
  }

  /**
   * Deletes a template. The last remaining template cannot be deleted; when the
   * template is the active one, the active pointer moves to the remaining
   * template with the lowest id inside the same transaction.
   */
  async delete(id: number): Promise<{ reassignedActiveTo: number | null }> {
    return AppDataSource.transaction(async (manager) => {
      const template = await manager.findOne(PromptTemplate, { where: { id } });
      if (!template) {
        throw new HttpError(404, 'Template not found');
      }

      const total = await manager.count(PromptTemplate);
      if (total <= 1) {
        throw new HttpError(400, 'Cannot delete the last template');
      }

      let reassignedActiveTo: number | null = null;
      const settings = await manager.findOne(AppSettings, { where: { id: APP_SETTINGS_ID } });
      if (settings?.activeTemplateId === id) {
        const [replacement] = await manager
          .createQueryBuilder(PromptTemplate, 'template')
          .where('template.id != :id', { id })
          .orderBy('template.id', 'ASC')
          .limit(1)
          .getMany();
        reassignedActiveTo = replacement.id;
        await manager.update(AppSettings, { id: APP_SETTINGS_ID }, { activeTemplateId: replacement.id });
        logger.info(`Active template moved from ${id} to ${replacement.id}`);
      }

      await manager.delete(PromptTemplate, { id });
      return { reassignedActiveTo };
    });
  }

  async count(): Promise<number> {
    return this.templateRepo.count();
  }
}

export const promptTemplateService = new PromptTemplateService();
