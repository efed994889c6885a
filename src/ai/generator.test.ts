import { describe, it, expect, vi } from 'vitest';
import * as fc from 'fast-check';
import {
  buildArticlePrompt,
  generateArticle,
  splitTitle,
  titleize,
  wordCountFor,
} from './generator.js';
import type { AiClient } from './types.js';

const output = { language: 'Indonesian', tone: 'informative and engaging' };

describe('wordCountFor', () => {
  it('maps the known lengths', () => {
    expect(wordCountFor('short')).toBe(200);
    expect(wordCountFor('medium')).toBe(500);
    expect(wordCountFor('long')).toBe(1000);
  });

  it('treats any other length as medium', () => {
    fc.assert(
      fc.property(
        fc.string().filter(s => !['short', 'medium', 'long'].includes(s)),
        (length) => {
          expect(wordCountFor(length)).toBe(500);
        },
      ),
      { numRuns: 100 },
    );
  });

  it('ignores inherited property names', () => {
    expect(wordCountFor('constructor')).toBe(500);
    expect(wordCountFor('toString')).toBe(500);
  });
});

describe('buildArticlePrompt', () => {
  it('includes the language, topic, length and style', () => {
    expect(buildArticlePrompt('Benefits of AI', 500, output)).toBe(
      "Write an article in Indonesian about 'Benefits of AI' that is roughly 500 words long. " +
      'Write in a style that is informative and engaging, suitable for a WordPress blog. ' +
      'Include a relevant title and well-structured content with clear paragraphs.',
    );
  });
});

describe('titleize', () => {
  it('capitalizes each word and lowercases the rest', () => {
    expect(titleize('manfaat teknologi AI')).toBe('Manfaat Teknologi Ai');
  });

  it('treats non-letters as word boundaries', () => {
    expect(titleize('hello-world 3d')).toBe('Hello-World 3D');
  });
});

describe('splitTitle', () => {
  it('uses a heading first line as the title', () => {
    expect(splitTitle('## Judul Artikel ##\nPara 1\n\nPara 2\n', 'topik')).toEqual({
      title: 'Judul Artikel',
      content: 'Para 1\n\nPara 2',
    });
  });

  it('falls back to the titleized topic and keeps the whole text', () => {
    const text = 'No heading here\nSecond line';
    expect(splitTitle(text, 'benefits of ai')).toEqual({
      title: 'Benefits Of Ai',
      content: text,
    });
  });

  it('handles an empty response', () => {
    expect(splitTitle('', 'x')).toEqual({ title: 'X', content: '' });
  });
});

describe('generateArticle', () => {
  it('sends one prompt and splits the response', async () => {
    const generate = vi.fn<(prompt: string) => Promise<string>>(async () => '# Title\nBody');
    const client: AiClient = { provider: 'gemini', model: 'test-model', generate };

    const article = await generateArticle(client, 'topic', 'long', output);

    expect(generate).toHaveBeenCalledTimes(1);
    expect(generate).toHaveBeenCalledWith(buildArticlePrompt('topic', 1000, output));
    expect(article).toEqual({ title: 'Title', content: 'Body' });
  });
});
