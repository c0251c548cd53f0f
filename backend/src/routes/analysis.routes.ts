import { Router } from 'express';
import { query } from 'express-validator';
import { analyzeWord, reanalyzeWord, getSpeech } from '../controllers/analysis.controller';
import { handleValidationErrors } from '../middleware/express-validator.middleware';
import { validate } from '../middleware/validate';
import { MAX_WORD_LENGTH, wordSchema } from '../middleware/validation-schemas';

const router = Router();

router.post('/analyze', validate(wordSchema), analyzeWord);
router.post('/reanalyze', validate(wordSchema), reanalyzeWord);

router.get('/tts',
  [
    query('word').isString().trim().isLength({ min: 1, max: MAX_WORD_LENGTH }),
  ],
  handleValidationErrors,
  getSpeech
);

export { router as analysisRouter };
