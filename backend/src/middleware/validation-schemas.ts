import Joi from 'joi';

export const MAX_WORD_LENGTH = 100;

export const wordSchema = Joi.object({
  word: Joi.string().trim().required().min(1).max(MAX_WORD_LENGTH),
});

export const cacheEntrySchema = Joi.object({
  analysis: Joi.string().required().min(1),
});

export const templateSchema = Joi.object({
  name: Joi.string().trim().required().min(1).max(120),
  content: Joi.string().required().min(1),
});

export const activeTemplateSchema = Joi.object({
  id: Joi.number().integer().min(1).required(),
});
