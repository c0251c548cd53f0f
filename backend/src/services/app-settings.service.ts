import { AppDataSource } from '../config/data-source';
import { APP_SETTINGS_ID, AppSettings } from '../models/app-settings.model';
import { PromptTemplate } from '../models/prompt-template.model';
import { HttpError } from '../utils/http';

/**
 * Access to the single `app_settings` row. Writes go through an upsert on the
 * fixed id, so the row is created on first write and updated afterwards.
 */
export class AppSettingsService {
  private readonly settingsRepo = AppDataSource.getRepository(AppSettings);
  private readonly templateRepo = AppDataSource.getRepository(PromptTemplate);

  async get(): Promise<AppSettings | null> {
    return this.settingsRepo.findOne({ where: { id: APP_SETTINGS_ID } });
  }

  async getActiveTemplate(): Promise<PromptTemplate | null> {
    const settings = await this.settingsRepo.findOne({
      where: { id: APP_SETTINGS_ID },
      relations: { activeTemplate: true },
    });
    return settings?.activeTemplate ?? null;
  }

  async setActiveTemplate(templateId: number): Promise<AppSettings> {
    const exists = await this.templateRepo.exists({ where: { id: templateId } });
    if (!exists) {
      throw new HttpError(404, 'Template not found');
    }
    return this.save({ activeTemplateId: templateId });
  }

  async save(values: { activeTemplateId: number | null }): Promise<AppSettings> {
    await this.settingsRepo.upsert(
      { id: APP_SETTINGS_ID, activeTemplateId: values.activeTemplateId },
      ['id']
    );
    return this.settingsRepo.findOneOrFail({ where: { id: APP_SETTINGS_ID } });
  }
}

export const appSettingsService = new AppSettingsService();
