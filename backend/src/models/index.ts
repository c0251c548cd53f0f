import { AppSettings } from './app-settings.model';
import { PromptTemplate } from './prompt-template.model';
import { WordCacheEntry } from './word-cache-entry.model';

export { AppSettings, APP_SETTINGS_ID } from './app-settings.model';
export { PromptTemplate } from './prompt-template.model';
export { WordCacheEntry } from './word-cache-entry.model';

export const ENTITIES = [AppSettings, PromptTemplate, WordCacheEntry];
