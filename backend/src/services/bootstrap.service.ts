import fs from 'fs';
import { AppDataSource } from '../config/data-source';
import { getDefaultTemplatePath } from '../config/env';
import { APP_SETTINGS_ID, AppSettings } from '../models/app-settings.model';
import { PromptTemplate } from '../models/prompt-template.model';
import { logger } from '../utils/logger';

export const DEFAULT_TEMPLATE_NAME = 'Default';
export const FALLBACK_TEMPLATE_CONTENT = 'Please provide a default template.';

async function readDefaultTemplate(): Promise<string> {
  const templatePath = getDefaultTemplatePath();
  try {
    return await fs.promises.readFile(templatePath, 'utf-8');
  } catch (error) {
    logger.warn(`Default template not readable at ${templatePath}, using placeholder`, {
      error: error instanceof Error ? error.message : String(error),
    });
    return FALLBACK_TEMPLATE_CONTENT;
  }
}

/**
 * Seeds the first template and the settings row on an empty database.
 */
export async function ensureDefaults(): Promise<void> {
  const templateRepository = AppDataSource.getRepository(PromptTemplate);
  const settingsRepository = AppDataSource.getRepository(AppSettings);

  if ((await templateRepository.count()) === 0) {
    const template = templateRepository.create({
      name: DEFAULT_TEMPLATE_NAME,
      content: await readDefaultTemplate(),
    });
    await templateRepository.save(template);
    logger.info('Default prompt template created');
  }

  const settings = await settingsRepository.findOne({ where: { id: APP_SETTINGS_ID } });
  if (!settings) {
    const [firstTemplate] = await templateRepository.find({ order: { id: 'ASC' }, take: 1 });
    await settingsRepository.insert({
      id: APP_SETTINGS_ID,
      activeTemplateId: firstTemplate ? firstTemplate.id : null,
    });
    logger.info('App settings created');
  }
}
