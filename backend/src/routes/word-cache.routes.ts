import { Router } from 'express';
import { param, query } from 'express-validator';
import { listWords, getWord, putWord, deleteWord } from '../controllers/word-cache.controller';
import { handleValidationErrors } from '../middleware/express-validator.middleware';
import { validate } from '../middleware/validate';
import { cacheEntrySchema, MAX_WORD_LENGTH } from '../middleware/validation-schemas';

const router = Router();

const wordParam = param('word').trim().isLength({ min: 1, max: MAX_WORD_LENGTH });

router.get('/',
  [
    query('limit').optional().isInt({ min: 1, max: 500 }),
    query('offset').optional().isInt({ min: 0 }),
  ],
  handleValidationErrors,
  listWords
);

router.get('/:word', [wordParam], handleValidationErrors, getWord);

router.put('/:word',
  [wordParam],
  handleValidationErrors,
  validate(cacheEntrySchema),
  putWord
);

router.delete('/:word', [wordParam], handleValidationErrors, deleteWord);

export { router as wordCacheRouter };
