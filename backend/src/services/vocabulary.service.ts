import fs from 'fs';
import { getVocabularyFilePath } from '../config/env';

export interface VocabularyUnit {
  title: string;
  groups: string[][];
}

const UNIT_MARKER = '===';
const TITLE_MARKER = '+++';
const GROUP_MARKER = '---';

/**
 * Parses the plain-text vocabulary list:
 *
 * ```
 * ===
 * Unit 1: Fruit
 * +++
 * ---
 * apple
 * pear
 * ---
 * plum
 * ```
 *
 * A unit takes the line right before `+++` as its title; words before the
 * title are ignored, and a unit without `+++` keeps an empty title. `---`
 * starts a new group; empty groups are dropped.
 */
export function parseVocabulary(text: string): VocabularyUnit[] {
  const units: VocabularyUnit[] = [];
  let unit: VocabularyUnit | null = null;
  let group: string[] | null = null;
  let previousLine: string | null = null;

  const closeGroup = () => {
    if (unit && group && group.length > 0) {
      unit.groups.push(group);
    }
    group = null;
  };

  const closeUnit = () => {
    closeGroup();
    if (unit) {
      units.push(unit);
    }
    unit = null;
  };

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) continue;

    if (line.startsWith(UNIT_MARKER)) {
      closeUnit();
      unit = { title: '', groups: [] };
      previousLine = null;
    } else if (line.startsWith(TITLE_MARKER)) {
      if (unit && previousLine) {
        unit.title = previousLine;
      }
      previousLine = null;
    } else if (line.startsWith(GROUP_MARKER)) {
      closeGroup();
      group = [];
    } else if (unit && unit.title) {
      if (!group) {
        group = [];
      }
      group.push(line);
    } else {
      previousLine = line;
    }
  }

  closeUnit();
  return units;
}

export class VocabularyService {
  constructor(private readonly filePath: () => string = getVocabularyFilePath) {}

  async getUnits(): Promise<VocabularyUnit[]> {
    try {
      const text = await fs.promises.readFile(this.filePath(), 'utf-8');
      return parseVocabulary(text);
    } catch (error) {
      if (typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }
  }
}

export const vocabularyService = new VocabularyService();
