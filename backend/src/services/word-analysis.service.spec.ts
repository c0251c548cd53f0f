jest.mock('../config/data-source', () => {
  const { createTestDataSource } = jest.requireActual<typeof import('../test/test-data-source')>(
    '../test/test-data-source'
  );
  return { AppDataSource: createTestDataSource() };
});

import { AppDataSource } from '../config/data-source';
import { resetDatabase } from '../test/test-data-source';
import { HttpError } from '../utils/http';
import { AppSettingsService } from './app-settings.service';
import { PromptTemplateService } from './prompt-template.service';
import { WordAnalysisService } from './word-analysis.service';
import { WordCacheService } from './word-cache.service';
import { WordAnalyzer } from './word-analyzer.service';

describe('WordAnalysisService', () => {
  let cache: WordCacheService;
  let settings: AppSettingsService;
  let analyzer: jest.Mocked<WordAnalyzer>;
  let service: WordAnalysisService;

  const activateTemplate = async (content = 'Analyze: {word}') => {
    const template = await new PromptTemplateService().create({ name: 'default', content });
    await settings.setActiveTemplate(template.id);
  };

  beforeEach(async () => {
    await resetDatabase(AppDataSource);
    cache = new WordCacheService();
    settings = new AppSettingsService();
    analyzer = { analyze: jest.fn() };
    service = new WordAnalysisService(cache, settings, analyzer);
  });

  afterAll(async () => {
    await AppDataSource.destroy();
  });

  it('analyzes an unseen word with the active template and caches the result', async () => {
    await activateTemplate();
    analyzer.analyze.mockResolvedValue('## Meaning\nA fruit');

    const result = await service.analyze('apple');

    expect(analyzer.analyze).toHaveBeenCalledWith('apple', 'Analyze: {word}');
    expect(result).toMatchObject({ word: 'apple', analysis: '## Meaning\nA fruit', cached: false });
    expect(result.html).toContain('<h2>Meaning</h2>');
    await expect(cache.get('apple')).resolves.toMatchObject({ analysis: '## Meaning\nA fruit' });
  });

  it('serves a cached word without calling the analyzer', async () => {
    await cache.put('apple', 'cached text');

    const result = await service.analyze('apple');

    expect(analyzer.analyze).not.toHaveBeenCalled();
    expect(result).toMatchObject({ analysis: 'cached text', cached: true });
    expect(result.html).toBe('<p>cached text</p>\n');
  });

  it('re-analyzes when forced and overwrites the cached entry', async () => {
    await activateTemplate();
    const original = await cache.put('apple', 'old');
    analyzer.analyze.mockResolvedValue('new');

    const result = await service.analyze('apple', { force: true });

    expect(analyzer.analyze).toHaveBeenCalledTimes(1);
    expect(result).toMatchObject({ analysis: 'new', cached: false });
    expect(result.timestamp.getTime()).toBeGreaterThanOrEqual(original.timestamp.getTime());
    await expect(cache.count()).resolves.toBe(1);
    await expect(cache.get('apple')).resolves.toMatchObject({ analysis: 'new' });
  });

  it('fails with 400 when no template is active', async () => {
    const error = await service.analyze('apple').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(HttpError);
    expect(error).toMatchObject({ statusCode: 400, message: 'No active template found.' });
    expect(analyzer.analyze).not.toHaveBeenCalled();
  });

  it('leaves the cache untouched when the analyzer fails', async () => {
    await activateTemplate();
    analyzer.analyze.mockRejectedValue(new HttpError(502, 'Analysis request failed after 3 attempts.'));

    await expect(service.analyze('apple')).rejects.toMatchObject({ statusCode: 502 });
    await expect(cache.get('apple')).resolves.toBeNull();
  });
});
