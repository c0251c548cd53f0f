export const ANALYSIS_SYSTEM_PROMPT =
  'You are a helpful assistant that analyzes vocabulary words in Markdown format.';

const WORD_PLACEHOLDER = /\{word\}/g;

// Openers such as "Sure, here is the analysis of apple:" or "好的，这是对apple的词源分析："
const PREAMBLE_PATTERNS = [
  /^好的，这是对.*?的词源分析：\s*/i,
  /^(?:sure|certainly|of course)[,!.]?\s+here(?:'s| is)[^\n]*?:\s*/i,
];

const LEADING_HEADING = /^#[^\n]*\s*/;

export function buildAnalysisPrompt(word: string, templateContent: string): string {
  const structure = templateContent.replace(WORD_PLACEHOLDER, word);
  return `Analyze the word "${word}" using the structure below (keep the Markdown formatting):\n\n${structure}`;
}

/**
 * Strips a conversational opener and the leading title heading the model tends
 * to add; the client renders the word itself as the title.
 */
export function cleanAnalysisText(raw: string): string {
  let text = raw.trim();
  for (const pattern of PREAMBLE_PATTERNS) {
    text = text.replace(pattern, '');
  }
  return text.replace(LEADING_HEADING, '').trim();
}
