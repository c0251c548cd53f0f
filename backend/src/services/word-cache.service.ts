import { AppDataSource } from '../config/data-source';
import { WordCacheEntry } from '../models/word-cache-entry.model';

export interface CachedAnalysis {
  word: string;
  analysis: string;
  timestamp: Date;
}

export interface WordCachePage {
  items: CachedAnalysis[];
  total: number;
}

function toCachedAnalysis(entry: WordCacheEntry): CachedAnalysis {
  return {
    word: entry.word,
    analysis: entry.analysis,
    timestamp: entry.timestamp,
  };
}

/**
 * Durable word → analysis cache. Entries are never expired; a write either
 * inserts the word or replaces its analysis, and always stamps the write time.
 */
export class WordCacheService {
  private readonly cacheRepo = AppDataSource.getRepository(WordCacheEntry);

  async get(word: string): Promise<CachedAnalysis | null> {
    const entry = await this.cacheRepo.findOne({ where: { word } });
    return entry ? toCachedAnalysis(entry) : null;
  }

  async put(word: string, analysis: string): Promise<CachedAnalysis> {
    // INSERT ... ON CONFLICT DO UPDATE: analysis and timestamp change in one statement
    await this.cacheRepo.upsert(
      { word, analysis, timestamp: new Date() },
      { conflictPaths: ['word'], skipUpdateIfNoValuesChanged: false }
    );
    const stored = await this.cacheRepo.findOneOrFail({ where: { word } });
    return toCachedAnalysis(stored);
  }

  async delete(word: string): Promise<boolean> {
    const result = await this.cacheRepo.delete({ word });
    return (result.affected ?? 0) > 0;
  }

  async list(options: { limit?: number; offset?: number } = {}): Promise<WordCachePage> {
    const [entries, total] = await this.cacheRepo.findAndCount({
      order: { timestamp: 'DESC', word: 'ASC' },
      take: options.limit ?? 50,
      skip: options.offset ?? 0,
    });
    return { items: entries.map(toCachedAnalysis), total };
  }

  async count(): Promise<number> {
    return this.cacheRepo.count();
  }
}

export const wordCacheService = new WordCacheService();
