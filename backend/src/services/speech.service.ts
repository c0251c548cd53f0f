import { randomUUID } from 'crypto';
import fs from 'fs';
import path from 'path';
import OpenAI from 'openai';
import { getAudioCacheDir, getOpenAIApiKey, getTtsModel, getTtsVoice } from '../config/env';
import { HttpError } from '../utils/http';
import { logger } from '../utils/logger';

export interface SpeechSynthesizer {
  synthesize(text: string): Promise<Buffer>;
}

export class OpenAISpeechSynthesizer implements SpeechSynthesizer {
  private client: OpenAI | null = null;

  private getClient(): OpenAI {
    if (!this.client) {
      const apiKey = getOpenAIApiKey();
      if (!apiKey) {
        throw new HttpError(503, 'Speech service is not configured');
      }
      this.client = new OpenAI({ apiKey });
    }
    return this.client;
  }

  async synthesize(text: string): Promise<Buffer> {
    const response = await this.getClient().audio.speech.create({
      model: getTtsModel(),
      voice: getTtsVoice(),
      input: text,
      response_format: 'mp3',
    });
    return Buffer.from(await response.arrayBuffer());
  }
}

/** Keeps letters and digits only, so the word can be used as a file name. */
export function audioFileNameFor(word: string): string | null {
  const safe = Array.from(word)
    .filter((char) => /[\p{L}\p{N}]/u.test(char))
    .join('');
  return safe ? `${safe}.mp3` : null;
}

export class SpeechService {
  constructor(
    private readonly synthesizer: SpeechSynthesizer = new OpenAISpeechSynthesizer(),
    private readonly cacheDir: () => string = getAudioCacheDir
  ) {}

  /**
   * Path of the cached mp3 for a word, synthesizing and writing it on a miss.
   */
  async getAudioFile(word: string): Promise<string> {
    const fileName = audioFileNameFor(word);
    if (!fileName) {
      throw new HttpError(400, 'Word must contain letters or digits');
    }

    const dir = this.cacheDir();
    const filePath = path.join(dir, fileName);
    if (fs.existsSync(filePath)) {
      return filePath;
    }

    try {
      const audio = await this.synthesizer.synthesize(word);
      await fs.promises.mkdir(dir, { recursive: true });
      // Readers only ever see a complete file at filePath
      const tempPath = path.join(dir, `.${fileName}.${randomUUID()}.tmp`);
      try {
        await fs.promises.writeFile(tempPath, audio);
        await fs.promises.rename(tempPath, filePath);
      } catch (writeError) {
        await fs.promises.rm(tempPath, { force: true });
        throw writeError;
      }
      logger.info(`Synthesized audio for "${word}"`, { file: fileName });
      return filePath;
    } catch (error) {
      if (error instanceof HttpError) {
        throw error;
      }
      logger.error(`Speech generation failed for word "${word}"`, {
        error: error instanceof Error ? error.message : String(error),
      });
      throw new HttpError(502, 'Speech generation failed');
    }
  }
}

export const speechService = new SpeechService();
