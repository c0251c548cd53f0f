import { Request, Response, NextFunction } from 'express';
import { wordCacheService } from '../services/word-cache.service';
import { HttpError } from '../utils/http';

export const listWords = async (req: Request, res: Response, next: NextFunction) => {
  try {
    const limit = req.query.limit ? Number(req.query.limit) : undefined;
    const offset = req.query.offset ? Number(req.query.offset) : undefined;
    res.json(await wordCacheService.list({ limit, offset }));
  } catch (error) {
    next(error);
  }
};

export const getWord = async (req: Request, res: Response, next: NextFunction) => {
  try {
    const entry = await wordCacheService.get(req.params.word);
    if (!entry) {
      throw new HttpError(404, 'Word is not cached');
    }
    res.json(entry);
  } catch (error) {
    next(error);
  }
};

export const putWord = async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { analysis }: { analysis: string } = req.body;
    const entry = await wordCacheService.put(req.params.word, analysis);
    res.json(entry);
  } catch (error) {
    next(error);
  }
};

export const deleteWord = async (req: Request, res: Response, next: NextFunction) => {
  try {
    const removed = await wordCacheService.delete(req.params.word);
    if (!removed) {
      throw new HttpError(404, 'Word is not cached');
    }
    res.status(204).end();
  } catch (error) {
    next(error);
  }
};
