import OpenAI from 'openai';
import { z } from 'zod';
import { CancelledError, Config, NetworkError, ParseError, errorMessage } from '../types/index.js';
import { createChildLogger } from '../utils/logger.js';
import { truncateText } from '../utils/text-sanitizer.js';
import { Classification, Classifier, ClassifyOptions } from './types.js';

const logger = createChildLogger('classifier');

/** Characters of page text sent to the model */
export const MAX_CLASSIFIER_INPUT = 6000;

const SYSTEM_PROMPT =
  'You are an information extraction assistant. Reply with JSON only, exactly in the shape the user message asks for.';

const EXTRACTION_PROMPT = [
  'Decide whether the notice below announces a registration or application window with a deadline.',
  'Only when it does, extract the date registration opens and the date it closes.',
  'Reply with strict JSON: {"isRelevant": boolean, "startDate": "YYYY-MM-DD" or null, "endDate": "YYYY-MM-DD" or null}.',
  'If it is not such a notice, set isRelevant to false and both dates to null.',
  'Ignore event, judging, training and submission dates; use only the registration window.',
  'If only one date appears or a date cannot be determined, use null for the missing field.',
  'Do not add any other text and do not wrap the JSON in a code block.',
].join('\n');

const RawClassificationSchema = z.object({
  isRelevant: z.boolean().optional(),
  is_relevant: z.boolean().optional(),
  startDate: z.string().nullable().optional(),
  start_date: z.string().nullable().optional(),
  endDate: z.string().nullable().optional(),
  end_date: z.string().nullable().optional(),
});

/**
 * Normalize a loosely written date ("2025-3-7", "2025/03/07",
 * "2025年3月7日") to YYYY-MM-DD. Returns null when no valid
 * calendar date is found.
 */
export function normalizeDate(value: string | null | undefined): string | null {
  if (!value) {
    return null;
  }
  const match = value.match(/(\d{4})\s*[年./-]\s*(\d{1,2})\s*[月./-]\s*(\d{1,2})/);
  if (!match) {
    return null;
  }
  const year = parseInt(match[1], 10);
  const month = parseInt(match[2], 10);
  const day = parseInt(match[3], 10);
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return date.toISOString().substring(0, 10);
}

/**
 * Parse a model reply into a Classification. Code fences are tolerated;
 * anything else that is not the expected JSON object is a ParseError.
 */
export function parseClassification(reply: string): Classification {
  let text = reply.trim();
  const fenced = text.match(/^```(?:json)?\s*([\s\S]*?)\s*```$/i);
  if (fenced) {
    text = fenced[1];
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new ParseError('Classifier reply is not valid JSON', { reply: reply.substring(0, 200), error });
  }

  const parsed = RawClassificationSchema.safeParse(json);
  if (!parsed.success) {
    throw new ParseError('Classifier reply has an unexpected shape', { issues: parsed.error.issues });
  }

  const isRelevant = parsed.data.isRelevant ?? parsed.data.is_relevant;
  if (isRelevant === undefined) {
    throw new ParseError('Classifier reply is missing isRelevant', { reply: reply.substring(0, 200) });
  }

  if (!isRelevant) {
    return { isRelevant: false, startDate: null, endDate: null };
  }

  return {
    isRelevant: true,
    startDate: normalizeDate(parsed.data.startDate ?? parsed.data.start_date),
    endDate: normalizeDate(parsed.data.endDate ?? parsed.data.end_date),
  };
}

/**
 * Classifier backed by an OpenAI-compatible chat completion endpoint
 */
export class OpenAIClassifier implements Classifier {
  private client: OpenAI;

  constructor(private config: Config['classifier']) {
    this.client = new OpenAI({
      baseURL: config.baseUrl,
      apiKey: config.apiKey,
      timeout: config.timeoutMs,
      maxRetries: config.maxRetries,
    });
  }

  async classify(content: string, options: ClassifyOptions = {}): Promise<Classification> {
    const input = truncateText(content, MAX_CLASSIFIER_INPUT);
    logger.debug({ inputLength: input.length, model: this.config.model }, 'Classifying content');

    let reply: string;
    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.config.model,
          temperature: 0,
          messages: [
            { role: 'system', content: SYSTEM_PROMPT },
            { role: 'user', content: `${EXTRACTION_PROMPT}\n\n${input}` },
          ],
        },
        { timeout: this.config.timeoutMs, ...(options.signal ? { signal: options.signal } : {}) }
      );
      reply = response.choices[0]?.message?.content ?? '';
    } catch (error) {
      if (options.signal?.aborted) {
        throw new CancelledError('Classification cancelled');
      }
      logger.error({ error: errorMessage(error) }, 'Classification request failed');
      throw new NetworkError('Classification request failed', error);
    }

    const classification = parseClassification(reply);
    logger.info(
      { isRelevant: classification.isRelevant, endDate: classification.endDate },
      'Content classified'
    );
    return classification;
  }
}

/**
 * The configured classifier, or undefined when classification is disabled
 */
export function createClassifier(config: Config['classifier']): Classifier | undefined {
  return config.enabled ? new OpenAIClassifier(config) : undefined;
}
