import request from 'supertest';

jest.mock('./config/data-source', () => {
  const { createTestDataSource } = jest.requireActual<typeof import('./test/test-data-source')>(
    './test/test-data-source'
  );
  return { AppDataSource: createTestDataSource() };
});

import { AppDataSource } from './config/data-source';
import { createApp } from './app';
import { resetDatabase } from './test/test-data-source';
import { DUPLICATE_TEMPLATE_MESSAGE } from './services/prompt-template.service';

describe('Template routes', () => {
  const app = createApp();

  const createTemplate = (name: string, content = 'Analyze: {word}') =>
    request(app).post('/api/templates').send({ name, content });

  beforeEach(async () => {
    await resetDatabase(AppDataSource);
  });

  afterAll(async () => {
    await AppDataSource.destroy();
  });

  it('creates a template and lists it', async () => {
    const created = await createTemplate('  default  ');
    expect(created.status).toBe(201);
    expect(created.body).toEqual({ message: 'Template created', id: 1 });

    const list = await request(app).get('/api/templates');
    expect(list.status).toBe(200);
    expect(list.body).toEqual([{ id: 1, name: 'default' }]);
  });

  it('returns the full template by id', async () => {
    await createTemplate('default', '## {word}');

    const res = await request(app).get('/api/templates/1');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ id: 1, name: 'default', content: '## {word}' });
  });

  it('answers 409 for a duplicate name', async () => {
    await createTemplate('default');

    const res = await createTemplate('default');

    expect(res.status).toBe(409);
    expect(res.body).toEqual({
      error: DUPLICATE_TEMPLATE_MESSAGE,
      message: DUPLICATE_TEMPLATE_MESSAGE,
      statusCode: 409,
    });
  });

  it('validates the body', async () => {
    const res = await request(app).post('/api/templates').send({ name: 'default' });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({
      error: 'Validation error',
      details: [{ field: 'content', message: '"content" is required' }],
    });
  });

  it('validates the id parameter', async () => {
    const res = await request(app).get('/api/templates/abc');

    expect(res.status).toBe(400);
    expect(res.body.details).toEqual([{ field: 'id', message: 'Invalid value' }]);
  });

  it('answers 404 for a missing template', async () => {
    const res = await request(app).get('/api/templates/42');

    expect(res.status).toBe(404);
    expect(res.body.message).toBe('Template not found');
  });

  it('updates a template', async () => {
    await createTemplate('draft', 'old');

    const res = await request(app).put('/api/templates/1').send({ name: 'final', content: 'new' });

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ message: 'Template updated' });
    const fetched = await request(app).get('/api/templates/1');
    expect(fetched.body).toEqual({ id: 1, name: 'final', content: 'new' });
  });

  describe('active template', () => {
    it('answers 404 until a template is activated', async () => {
      const res = await request(app).get('/api/templates/active');

      expect(res.status).toBe(404);
      expect(res.body.message).toBe('No active template');
    });

    it('activates an existing template', async () => {
      await createTemplate('default', 'Analyze: {word}');

      const set = await request(app).post('/api/templates/active').send({ id: 1 });
      expect(set.status).toBe(200);
      expect(set.body).toEqual({ message: 'Active template updated' });

      const active = await request(app).get('/api/templates/active');
      expect(active.status).toBe(200);
      expect(active.body).toEqual({ id: 1, name: 'default', content: 'Analyze: {word}' });
    });

    it('refuses to activate a missing template', async () => {
      const res = await request(app).post('/api/templates/active').send({ id: 9 });

      expect(res.status).toBe(404);
      expect(res.body.message).toBe('Template not found');
    });
  });

  describe('deletion', () => {
    it('refuses to delete the last template', async () => {
      await createTemplate('only');

      const res = await request(app).delete('/api/templates/1');

      expect(res.status).toBe(400);
      expect(res.body.message).toBe('Cannot delete the last template');
    });

    it('moves the active pointer when the active template is deleted', async () => {
      await createTemplate('first');
      await createTemplate('second');
      await request(app).post('/api/templates/active').send({ id: 2 });

      const res = await request(app).delete('/api/templates/2');

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ message: 'Template deleted', activeTemplateId: 1 });
      const active = await request(app).get('/api/templates/active');
      expect(active.body).toMatchObject({ id: 1, name: 'first' });
    });

    it('deletes an inactive template', async () => {
      await createTemplate('first');
      await createTemplate('second');
      await request(app).post('/api/templates/active').send({ id: 1 });

      const res = await request(app).delete('/api/templates/2');

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ message: 'Template deleted' });
      const list = await request(app).get('/api/templates');
      expect(list.body).toEqual([{ id: 1, name: 'first' }]);
    });
  });
});
