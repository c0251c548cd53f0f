import { Marked } from 'marked';

const renderer = new Marked({ gfm: true, breaks: false });

export async function renderMarkdown(markdown: string): Promise<string> {
  return renderer.parse(markdown);
}
