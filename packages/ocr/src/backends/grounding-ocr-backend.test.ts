import type { LanguageModel } from 'ai';

import type { RegionImageExtractor } from '../processors/region-image-extractor';

import { createOpenAI } from '@ai-sdk/openai';
import { LLMCaller } from '@pagemill/shared';
import { readFileSync } from 'node:fs';
import { type Mock, beforeEach, describe, expect, test, vi } from 'vitest';

import { GroundingOcrBackend, createOllamaModel } from './grounding-ocr-backend';

vi.mock('@pagemill/shared', () => ({
  LLMCaller: {
    call: vi.fn(),
    extractModelName: vi.fn(() => 'deepseek-ocr'),
  },
}));

vi.mock('@ai-sdk/openai', () => ({
  createOpenAI: vi.fn(),
}));

vi.mock('node:fs', () => ({
  readFileSync: vi.fn(),
}));

const mockCall = LLMCaller.call as Mock;

const mockLogger = {
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
};

const model: LanguageModel = 'deepseek-ocr';

const usage = {
  component: 'GroundingOcrBackend',
  phase: 'ocr',
  model: 'primary',
  modelName: 'deepseek-ocr',
  inputTokens: 800,
  outputTokens: 120,
  totalTokens: 920,
};

const input = {
  pageNumber: 4,
  pdfPath: '/work/page-4.pdf',
  imagePath: '/work/page.png',
  workDir: '/work',
};

describe('createOllamaModel', () => {
  test('points the OpenAI provider at Ollama', () => {
    const chat = vi.fn(() => 'chat-model');
    vi.mocked(createOpenAI).mockReturnValue({ chat } as unknown as ReturnType<
      typeof createOpenAI
    >);

    const result = createOllamaModel('deepseek-ocr', 'http://ollama:11434/v1');

    expect(createOpenAI).toHaveBeenCalledWith({
      baseURL: 'http://ollama:11434/v1',
      apiKey: 'ollama',
    });
    expect(chat).toHaveBeenCalledWith('deepseek-ocr');
    expect(result).toBe('chat-model');
  });
});

describe('GroundingOcrBackend', () => {
  let extractor: { extract: Mock; renderOverlay: Mock };
  let backend: GroundingOcrBackend;

  beforeEach(() => {
    vi.clearAllMocks();
    vi.mocked(readFileSync).mockReturnValue(Buffer.from('png-bytes'));
    extractor = {
      extract: vi.fn().mockResolvedValue([]),
      renderOverlay: vi.fn().mockResolvedValue('/work/page-4-bbox.png'),
    };
    backend = new GroundingOcrBackend(
      mockLogger,
      { model },
      extractor as unknown as RegionImageExtractor,
    );
  });

  test('sends the prompt and page image to the model', async () => {
    mockCall.mockResolvedValue({ output: '', usage, usedFallback: false });

    await backend.process(input);

    expect(mockCall).toHaveBeenCalledWith({
      messages: [
        {
          role: 'user',
          content: [
            {
              type: 'text',
              text: '<|grounding|>Convert the document to markdown.',
            },
            {
              type: 'image',
              image: Buffer.from('png-bytes'),
              mediaType: 'image/png',
            },
          ],
        },
      ],
      primaryModel: model,
      fallbackModel: undefined,
      maxRetries: 2,
      temperature: 0,
      abortSignal: undefined,
      component: 'GroundingOcrBackend',
      phase: 'ocr',
    });
    expect(readFileSync).toHaveBeenCalledWith('/work/page.png');
  });

  test('uses a custom prompt', async () => {
    mockCall.mockResolvedValue({ output: '', usage, usedFallback: false });
    backend = new GroundingOcrBackend(
      mockLogger,
      { model, prompt: 'Free OCR.', maxRetries: 5 },
      extractor as unknown as RegionImageExtractor,
    );

    await backend.process(input);

    const config = mockCall.mock.calls[0][0];
    expect(config.messages[0].content[0]).toEqual({
      type: 'text',
      text: 'Free OCR.',
    });
    expect(config.maxRetries).toBe(5);
  });

  test('parses regions into Markdown with placeholders and extracts images', async () => {
    const output =
      '<|ref|>sub_title<|/ref|><|det|>[[10,10,500,40]]<|/det|>\nThe Mill\n' +
      '<|ref|>image<|/ref|><|det|>[[10,60,400,300]]<|/det|>\n' +
      '<|ref|>text<|/ref|><|det|>[[10,320,900,400]]<|/det|>\nWater turns the wheel.';
    mockCall.mockResolvedValue({ output, usage, usedFallback: false });
    const region = {
      regionIndex: 0,
      path: '/work/images/image_0.png',
      byteSize: 512,
      width: 780,
      height: 480,
    };
    extractor.extract.mockResolvedValue([region]);

    const result = await backend.process(input);

    expect(result.rawText).toBe(output);
    expect(result.markdown).toBe(
      '## The Mill\n\n![Image](__IMAGE_PLACEHOLDER_0__)\n\nWater turns the wheel.\n',
    );
    expect(result.references).toEqual([
      { type: 'sub_title', boundingBox: [10, 10, 500, 40], content: 'The Mill' },
      { type: 'image', boundingBox: [10, 60, 400, 300], content: '' },
      {
        type: 'text',
        boundingBox: [10, 320, 900, 400],
        content: 'Water turns the wheel.',
      },
    ]);
    expect(result.images).toEqual([region]);
    expect(result.overlayPath).toBe('/work/page-4-bbox.png');
    expect(extractor.extract).toHaveBeenCalledWith(
      '/work/page.png',
      result.references,
      '/work/images',
    );
    expect(extractor.renderOverlay).toHaveBeenCalledWith(
      '/work/page.png',
      result.references,
      '/work/page-4-bbox.png',
    );
  });

  test('omits the overlay when drawing failed', async () => {
    mockCall.mockResolvedValue({
      output: '<|ref|>text<|/ref|><|det|>[[0,0,10,10]]<|/det|>Hello world',
      usage,
      usedFallback: false,
    });
    extractor.renderOverlay.mockResolvedValue(null);

    const result = await backend.process(input);

    expect(result).not.toHaveProperty('overlayPath');
    expect(result.markdown).toBe('Hello world\n');
  });

  test('returns empty Markdown when the model emitted no grounding tags', async () => {
    mockCall.mockResolvedValue({
      output: 'plain answer',
      usage,
      usedFallback: false,
    });

    const result = await backend.process(input);

    expect(result).toEqual({
      rawText: 'plain answer',
      markdown: '',
      references: [],
      images: [],
    });
    expect(extractor.extract).not.toHaveBeenCalled();
    expect(mockLogger.warn).toHaveBeenCalledWith(
      '[GroundingOcrBackend] Page 4: no grounding tags in model output',
    );
  });

  test('propagates model failures', async () => {
    mockCall.mockRejectedValue(new Error('connect ECONNREFUSED'));

    await expect(backend.process(input)).rejects.toThrow('connect ECONNREFUSED');
  });
});
