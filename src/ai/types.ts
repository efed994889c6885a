export interface AiClient {
  readonly provider: 'gemini';
  readonly model: string;
  generate(prompt: string): Promise<string>;
}

export type ArticleLength = 'short' | 'medium' | 'long';

export interface GeneratedArticle {
  title: string;
  content: string;
}
