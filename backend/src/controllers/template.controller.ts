import { Request, Response, NextFunction } from 'express';
import { promptTemplateService, TemplatePayload } from '../services/prompt-template.service';
import { appSettingsService } from '../services/app-settings.service';
import { HttpError } from '../utils/http';
import { logger } from '../utils/logger';

export const listTemplates = async (_req: Request, res: Response, next: NextFunction) => {
  try {
    res.json(await promptTemplateService.list());
  } catch (error) {
    next(error);
  }
};

export const getTemplate = async (req: Request, res: Response, next: NextFunction) => {
  try {
    res.json(await promptTemplateService.getOrFail(Number(req.params.id)));
  } catch (error) {
    next(error);
  }
};

export const createTemplate = async (req: Request, res: Response, next: NextFunction) => {
  try {
    const payload: TemplatePayload = req.body;
    const template = await promptTemplateService.create(payload);
    logger.info(`Template created: ${template.name}`, { id: template.id });
    res.status(201).json({ message: 'Template created', id: template.id });
  } catch (error) {
    next(error);
  }
};

export const updateTemplate = async (req: Request, res: Response, next: NextFunction) => {
  try {
    const payload: TemplatePayload = req.body;
    await promptTemplateService.update(Number(req.params.id), payload);
    res.json({ message: 'Template updated' });
  } catch (error) {
    next(error);
  }
};

export const deleteTemplate = async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { reassignedActiveTo } = await promptTemplateService.delete(Number(req.params.id));
    res.json({ message: 'Template deleted', activeTemplateId: reassignedActiveTo ?? undefined });
  } catch (error) {
    next(error);
  }
};

export const getActiveTemplate = async (_req: Request, res: Response, next: NextFunction) => {
  try {
    const template = await appSettingsService.getActiveTemplate();
    if (!template) {
      throw new HttpError(404, 'No active template');
    }
    res.json(template);
  } catch (error) {
    next(error);
  }
};

export const setActiveTemplate = async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { id }: { id: number } = req.body;
    await appSettingsService.setActiveTemplate(id);
    res.json({ message: 'Active template updated' });
  } catch (error) {
    next(error);
  }
};
