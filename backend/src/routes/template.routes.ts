import { Router } from 'express';
import { param } from 'express-validator';
import {
  listTemplates,
  getTemplate,
  createTemplate,
  updateTemplate,
  deleteTemplate,
  getActiveTemplate,
  setActiveTemplate,
} from '../controllers/template.controller';
import { handleValidationErrors } from '../middleware/express-validator.middleware';
import { validate } from '../middleware/validate';
import { activeTemplateSchema, templateSchema } from '../middleware/validation-schemas';

const router = Router();

const idParam = param('id').isInt({ min: 1 });

router.get('/', listTemplates);
router.post('/', validate(templateSchema), createTemplate);

// Registered before '/:id' so "active" is not read as an id
router.get('/active', getActiveTemplate);
router.post('/active', validate(activeTemplateSchema), setActiveTemplate);

router.get('/:id', [idParam], handleValidationErrors, getTemplate);

router.put('/:id',
  [idParam],
  handleValidationErrors,
  validate(templateSchema),
  updateTemplate
);

router.delete('/:id', [idParam], handleValidationErrors, deleteTemplate);

export { router as templateRouter };
