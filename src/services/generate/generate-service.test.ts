import { beforeEach, describe, expect, it, vi } from 'vitest';

const { generateTextMock, createGoogleMock, googleModelMock } = vi.hoisted(() => {
  const googleModelMock = vi.fn((modelId: string) => ({ provider: 'google', modelId }));
  return {
    generateTextMock: vi.fn(),
    googleModelMock,
    createGoogleMock: vi.fn(() => googleModelMock),
  };
});

vi.mock('ai', () => ({ generateText: generateTextMock }));
vi.mock('@ai-sdk/google', () => ({ createGoogleGenerativeAI: createGoogleMock }));

import { MAINTENANCE_SYSTEM_PROMPT } from '../assistant/prompt-builder';
import { GenerateService, type GenerateServiceConfig } from './generate-service';

const CONFIG: GenerateServiceConfig = {
  apiKey: 'test-secret',
  model: 'gemini-test',
  temperature: 0.3,
  maxOutputTokens: 512,
  maxRetries: 1,
};

describe('GenerateService', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    generateTextMock.mockResolvedValue({
      text: 'Transformer TR-001 is operational.',
      usage: { inputTokens: 10, outputTokens: 5 },
    });
  });

  it('generates text with the configured model and options', async () => {
    const service = new GenerateService(CONFIG);
    const controller = new AbortController();

    await expect(service.generate('Question: status', controller.signal)).resolves.toBe(
      'Transformer TR-001 is operational.'
    );

    expect(createGoogleMock).toHaveBeenCalledWith({ apiKey: 'test-secret' });
    expect(googleModelMock).toHaveBeenCalledWith('gemini-test');
    expect(generateTextMock).toHaveBeenCalledWith({
      model: { provider: 'google', modelId: 'gemini-test' },
      system: MAINTENANCE_SYSTEM_PROMPT,
      prompt: 'Question: status',
      temperature: 0.3,
      maxOutputTokens: 512,
      maxRetries: 1,
      abortSignal: controller.signal,
    });
  });

  it('creates the provider once', async () => {
    const service = new GenerateService(CONFIG);
    await service.generate('a');
    await service.generate('b');

    expect(createGoogleMock).toHaveBeenCalledTimes(1);
  });

  it('tracks usage statistics', async () => {
    const service = new GenerateService(CONFIG);
    await service.generate('a');
    generateTextMock.mockRejectedValueOnce(new Error('upstream error'));
    await expect(service.generate('b')).rejects.toThrow('upstream error');

    expect(service.getStats()).toMatchObject({
      requests: 2,
      successes: 1,
      errors: 1,
      totalTokens: 15,
      successRate: 50,
      model: 'gemini-test',
    });
  });

  it('fails when no API key is configured', async () => {
    const service = new GenerateService({ ...CONFIG, apiKey: null });

    await expect(service.generate('a')).rejects.toThrow('GOOGLE_GENERATIVE_AI_API_KEY not configured');
    expect(generateTextMock).not.toHaveBeenCalled();
  });

  it('adapts to the generator contract', async () => {
    const service = new GenerateService(CONFIG);
    const controller = new AbortController();

    await service.asGenerator()('Question: costs', {
      context: {},
      records: [],
      signal: controller.signal,
    });

    expect(generateTextMock).toHaveBeenCalledWith(
      expect.objectContaining({ prompt: 'Question: costs', abortSignal: controller.signal })
    );
  });
});
