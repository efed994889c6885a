import type { OutputConfig } from '../config/schema.js';
import type { AiClient, ArticleLength, GeneratedArticle } from './types.js';

const WORD_COUNTS: Record<ArticleLength, number> = {
  short: 200,
  medium: 500,
  long: 1000,
};

const DEFAULT_WORD_COUNT = WORD_COUNTS.medium;

function isArticleLength(length: string): length is ArticleLength {
  return Object.hasOwn(WORD_COUNTS, length);
}

// 未知の長さ指定は medium 扱い
export function wordCountFor(length: string): number {
  return isArticleLength(length) ? WORD_COUNTS[length] : DEFAULT_WORD_COUNT;
}

export function buildArticlePrompt(topic: string, wordCount: number, output: OutputConfig): string {
  return (
    `Write an article in ${output.language} about '${topic}' that is roughly ${wordCount} words long. ` +
    `Write in a style that is ${output.tone}, suitable for a WordPress blog. ` +
    'Include a relevant title and well-structured content with clear paragraphs.'
  );
}

// 単語の先頭（文字以外の直後）を大文字、それ以外を小文字にする
export function titleize(text: string): string {
  return text
    .toLowerCase()
    .replace(/(^|[^\p{L}])(\p{L})/gu, (_match, boundary: string, letter: string) => boundary + letter.toUpperCase());
}

/**
 * 生成テキストの1行目が見出し（`#` 始まり）ならタイトルとして切り出す。
 * 見出しがない場合はトピックをタイトルにし、全文を本文とする。
 */
export function splitTitle(text: string, topic: string): GeneratedArticle {
  const lines = text.split('\n');
  const firstLine = lines[0] ?? '';

  if (!firstLine.startsWith('#')) {
    return { title: titleize(topic), content: text };
  }

  return {
    title: firstLine.replace(/^[# ]+|[# ]+$/g, '').trim(),
    content: lines.slice(1).join('\n').trim(),
  };
}

export async function generateArticle(
  client: AiClient,
  topic: string,
  length: string,
  output: OutputConfig,
): Promise<GeneratedArticle> {
  const prompt = buildArticlePrompt(topic, wordCountFor(length), output);
  const text = await client.generate(prompt);
  return splitTitle(text, topic);
}
