import { describe, it, expect, beforeEach, vi } from 'vitest';

const { GoogleGenerativeAI, getGenerativeModel, generateContent } = vi.hoisted(() => {
  const generateContent = vi.fn();
  const getGenerativeModel = vi.fn(function () {
    return { generateContent };
  });
  const GoogleGenerativeAI = vi.fn(function () {
    return { getGenerativeModel };
  });
  return { GoogleGenerativeAI, getGenerativeModel, generateContent };
});

vi.mock('@google/generative-ai', () => ({ GoogleGenerativeAI }));

import { GeminiAiClient, createAiClient } from './client.js';
import { ConfigurationError } from '../utils/error.js';

describe('GeminiAiClient', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('configures the SDK with the key and model', () => {
    const client = createAiClient('test-key', 'gemini-1.5-flash');

    expect(client.provider).toBe('gemini');
    expect(client.model).toBe('gemini-1.5-flash');
    expect(GoogleGenerativeAI).toHaveBeenCalledWith('test-key');
    expect(getGenerativeModel).toHaveBeenCalledWith({ model: 'gemini-1.5-flash' });
  });

  it('returns the response text of a single generateContent call', async () => {
    generateContent.mockResolvedValueOnce({ response: { text: () => '# Title\nBody' } });
    const client = new GeminiAiClient('test-key', 'gemini-1.5-flash');

    await expect(client.generate('Write something')).resolves.toBe('# Title\nBody');
    expect(generateContent).toHaveBeenCalledTimes(1);
    expect(generateContent).toHaveBeenCalledWith('Write something');
  });

  it('propagates SDK errors', async () => {
    generateContent.mockRejectedValueOnce(new Error('API key not valid'));
    const client = new GeminiAiClient('test-key', 'gemini-1.5-flash');

    await expect(client.generate('prompt')).rejects.toThrow('API key not valid');
  });

  it('rejects an empty API key', () => {
    expect(() => new GeminiAiClient('', 'gemini-1.5-flash')).toThrow(ConfigurationError);
    expect(GoogleGenerativeAI).not.toHaveBeenCalled();
  });
});
