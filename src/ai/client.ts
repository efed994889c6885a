import { GoogleGenerativeAI } from '@google/generative-ai';
import type { GenerativeModel } from '@google/generative-ai';
import type { AiClient } from './types.js';
import { ConfigurationError } from '../utils/error.js';

export type { AiClient } from './types.js';

export class GeminiAiClient implements AiClient {
  readonly provider = 'gemini' as const;
  private readonly generativeModel: GenerativeModel;

  constructor(apiKey: string, readonly model: string) {
    if (!apiKey) {
      throw new ConfigurationError('GEMINI_API_KEY が設定されていません。config/.env ファイルまたは環境変数に設定してください。');
    }
    this.generativeModel = new GoogleGenerativeAI(apiKey).getGenerativeModel({ model });
  }

  async generate(prompt: string): Promise<string> {
    const result = await this.generativeModel.generateContent(prompt);
    return result.response.text();
  }
}

export function createAiClient(apiKey: string, model: string): AiClient {
  return new GeminiAiClient(apiKey, model);
}
