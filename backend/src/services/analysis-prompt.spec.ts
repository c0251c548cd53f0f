import { buildAnalysisPrompt, cleanAnalysisText } from './analysis-prompt';

describe('buildAnalysisPrompt', () => {
  it('fills every {word} placeholder and keeps the template structure', () => {
    const prompt = buildAnalysisPrompt('apple', 'Analyze: {word}\n## Roots of {word}');

    expect(prompt).toBe(
      'Analyze the word "apple" using the structure below (keep the Markdown formatting):\n\n' +
        'Analyze: apple\n## Roots of apple'
    );
  });

  it('leaves templates without placeholders unchanged', () => {
    expect(buildAnalysisPrompt('pear', '## Meaning')).toBe(
      'Analyze the word "pear" using the structure below (keep the Markdown formatting):\n\n## Meaning'
    );
  });
});

describe('cleanAnalysisText', () => {
  it('drops an English preamble and the leading title heading', () => {
    const raw = 'Sure, here is the analysis of apple:\n\n# apple\n\n## Meaning\nA fruit';

    expect(cleanAnalysisText(raw)).toBe('## Meaning\nA fruit');
  });

  it('drops the Chinese etymology preamble', () => {
    const raw = '好的，这是对apple的词源分析：\n# apple\n## 词源\n古英语';

    expect(cleanAnalysisText(raw)).toBe('## 词源\n古英语');
  });

  it('keeps text that has neither preamble nor heading', () => {
    expect(cleanAnalysisText('  **apple** is a fruit.  ')).toBe('**apple** is a fruit.');
  });
});
