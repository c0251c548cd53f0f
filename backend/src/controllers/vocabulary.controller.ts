import { Request, Response, NextFunction } from 'express';
import { vocabularyService } from '../services/vocabulary.service';

export const getVocabulary = async (_req: Request, res: Response, next: NextFunction) => {
  try {
    res.json(await vocabularyService.getUnits());
  } catch (error) {
    next(error);
  }
};
