import { describe, it, expect, vi, beforeEach } from 'vitest';
import OpenAI from 'openai';
import { CancelledError, NetworkError, ParseError } from '../types/index.js';
import { createTestConfig } from '../../tests/helpers/fakes.js';
import {
  MAX_CLASSIFIER_INPUT,
  OpenAIClassifier,
  createClassifier,
  normalizeDate,
  parseClassification,
} from './classifier.js';

// Mock OpenAI client
const mockChatCompletionsCreate = vi.fn();

vi.mock('openai', () => ({
  default: vi.fn().mockImplementation(function () {
    return {
      chat: {
        completions: {
          create: mockChatCompletionsCreate,
        },
      },
    };
  }),
}));

function reply(content: string | null) {
  return { choices: [{ message: { content } }] };
}

describe('normalizeDate', () => {
  it('should normalize common date spellings', () => {
    expect(normalizeDate('2025-3-7')).toBe('2025-03-07');
    expect(normalizeDate('2025/03/07')).toBe('2025-03-07');
    expect(normalizeDate('2025.3.7 17:00')).toBe('2025-03-07');
    expect(normalizeDate('2025年3月7日')).toBe('2025-03-07');
  });

  it('should return null for impossible or missing dates', () => {
    expect(normalizeDate('2025-02-30')).toBeNull();
    expect(normalizeDate('next Friday')).toBeNull();
    expect(normalizeDate(null)).toBeNull();
    expect(normalizeDate('')).toBeNull();
  });
});

describe('parseClassification', () => {
  it('should parse a relevant reply', () => {
    expect(parseClassification('{"isRelevant": true, "startDate": "2025-03-01", "endDate": "2025-3-10"}')).toEqual({
      isRelevant: true,
      startDate: '2025-03-01',
      endDate: '2025-03-10',
    });
  });

  it('should accept snake_case keys inside a code fence', () => {
    const text = '```json\n{"is_relevant": true, "start_date": null, "end_date": "2025/04/01"}\n```';

    expect(parseClassification(text)).toEqual({ isRelevant: true, startDate: null, endDate: '2025-04-01' });
  });

  it('should drop dates for irrelevant content', () => {
    expect(parseClassification('{"isRelevant": false, "startDate": "2025-03-01", "endDate": "2025-03-10"}')).toEqual({
      isRelevant: false,
      startDate: null,
      endDate: null,
    });
  });

  it('should reject malformed replies', () => {
    expect(() => parseClassification('Sure! Here it is')).toThrow(ParseError);
    expect(() => parseClassification('{"isRelevant": "yes"}')).toThrow('unexpected shape');
    expect(() => parseClassification('{"startDate": null}')).toThrow('missing isRelevant');
  });
});

describe('OpenAIClassifier', () => {
  const config = createTestConfig({ classifier: { enabled: true } }).classifier;

  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should classify content with a deterministic request', async () => {
    mockChatCompletionsCreate.mockResolvedValueOnce(
      reply('{"isRelevant": true, "startDate": "2025-03-01", "endDate": "2025-03-10"}')
    );
    const classifier = new OpenAIClassifier(config);

    const result = await classifier.classify('Registration closes 10 March');

    expect(result).toEqual({ isRelevant: true, startDate: '2025-03-01', endDate: '2025-03-10' });
    expect(mockChatCompletionsCreate).toHaveBeenCalledWith(
      expect.objectContaining({ model: 'test-model', temperature: 0 })
    );
  });

  it('should bound each request by the configured timeout and the run signal', async () => {
    mockChatCompletionsCreate.mockResolvedValueOnce(reply('{"isRelevant": false}'));
    const classifier = new OpenAIClassifier(config);
    const controller = new AbortController();

    await classifier.classify('text', { signal: controller.signal });

    expect(OpenAI).toHaveBeenCalledWith(expect.objectContaining({ timeout: 5000, maxRetries: 0 }));
    expect(mockChatCompletionsCreate.mock.calls[0][1]).toEqual({ timeout: 5000, signal: controller.signal });
  });

  it('should report an aborted request as cancelled', async () => {
    const controller = new AbortController();
    mockChatCompletionsCreate.mockImplementationOnce(async () => {
      controller.abort();
      throw new Error('Request was aborted.');
    });
    const classifier = new OpenAIClassifier(config);

    await expect(classifier.classify('text', { signal: controller.signal })).rejects.toBeInstanceOf(CancelledError);
  });

  it('should truncate long input', async () => {
    mockChatCompletionsCreate.mockResolvedValueOnce(reply('{"isRelevant": false}'));
    const classifier = new OpenAIClassifier(config);

    await classifier.classify('a'.repeat(MAX_CLASSIFIER_INPUT + 500));

    const request = mockChatCompletionsCreate.mock.calls[0][0];
    const userMessage: string = request.messages[1].content;
    expect(userMessage.endsWith(`\n\n${'a'.repeat(MAX_CLASSIFIER_INPUT)}...`)).toBe(true);
  });

  it('should wrap request failures', async () => {
    mockChatCompletionsCreate.mockRejectedValueOnce(new Error('connect ECONNREFUSED'));
    const classifier = new OpenAIClassifier(config);

    await expect(classifier.classify('text')).rejects.toBeInstanceOf(NetworkError);
  });

  it('should treat an empty reply as a parse failure', async () => {
    mockChatCompletionsCreate.mockResolvedValueOnce(reply(null));
    const classifier = new OpenAIClassifier(config);

    await expect(classifier.classify('text')).rejects.toBeInstanceOf(ParseError);
  });
});

describe('createClassifier', () => {
  it('should return undefined when disabled', () => {
    expect(createClassifier(createTestConfig().classifier)).toBeUndefined();
  });

  it('should build the OpenAI classifier when enabled', () => {
    expect(createClassifier(createTestConfig({ classifier: { enabled: true } }).classifier)).toBeInstanceOf(
      OpenAIClassifier
    );
  });
});
