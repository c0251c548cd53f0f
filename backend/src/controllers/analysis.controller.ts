import { Request, Response, NextFunction } from 'express';
import { wordAnalysisService } from '../services/word-analysis.service';
import { speechService } from '../services/speech.service';

export const analyzeWord = async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { word }: { word: string } = req.body;
    const result = await wordAnalysisService.analyze(word);
    res.json(result);
  } catch (error) {
    next(error);
  }
};

export const reanalyzeWord = async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { word }: { word: string } = req.body;
    const result = await wordAnalysisService.analyze(word, { force: true });
    res.json(result);
  } catch (error) {
    next(error);
  }
};

export const getSpeech = async (req: Request, res: Response, next: NextFunction) => {
  try {
    const word = String(req.query.word);
    const filePath = await speechService.getAudioFile(word);
    res.type('audio/mpeg');
    res.sendFile(filePath, (err) => {
      if (err && !res.headersSent) {
        next(err);
      }
    });
  } catch (error) {
    next(error);
  }
};
