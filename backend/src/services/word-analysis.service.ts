import { HttpError } from '../utils/http';
import { logger } from '../utils/logger';
import { renderMarkdown } from '../utils/markdown';
import { appSettingsService, AppSettingsService } from './app-settings.service';
import { wordCacheService, WordCacheService } from './word-cache.service';
import { wordAnalyzer, WordAnalyzer } from './word-analyzer.service';

export interface WordAnalysisResult {
  word: string;
  /** Markdown as stored in the cache */
  analysis: string;
  html: string;
  cached: boolean;
  timestamp: Date;
}

export class WordAnalysisService {
  constructor(
    private readonly cache: WordCacheService = wordCacheService,
    private readonly settings: AppSettingsService = appSettingsService,
    private readonly analyzer: WordAnalyzer = wordAnalyzer
  ) {}

  /**
   * Returns the cached analysis of a word, or asks the analyzer with the active
   * template and caches the answer. `force` skips the cache lookup and
   * overwrites whatever was stored.
   */
  async analyze(word: string, options: { force?: boolean } = {}): Promise<WordAnalysisResult> {
    if (!options.force) {
      const cached = await this.cache.get(word);
      if (cached) {
        return {
          word,
          analysis: cached.analysis,
          html: await renderMarkdown(cached.analysis),
          cached: true,
          timestamp: cached.timestamp,
        };
      }
    }

    const template = await this.settings.getActiveTemplate();
    if (!template) {
      throw new HttpError(400, 'No active template found.');
    }

    const analysis = await this.analyzer.analyze(word, template.content);
    const stored = await this.cache.put(word, analysis);
    logger.info(`Analysis stored for "${word}"`, { template: template.name, force: Boolean(options.force) });

    return {
      word,
      analysis: stored.analysis,
      html: await renderMarkdown(stored.analysis),
      cached: false,
      timestamp: stored.timestamp,
    };
  }
}

export const wordAnalysisService = new WordAnalysisService();
