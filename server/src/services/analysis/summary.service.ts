/**
 * Narrative Summary
 * Asks the LLM for `{summary, ai_rating}` and validates the reply.
 */

import { z } from 'zod';
import type { Logger } from 'pino';
import type { LLMProvider } from '../../llm/types.js';
import { extractJsonBlock } from '../../llm/json-extract.js';
import {
  EnrichmentParseError,
  EnrichmentUnavailable,
  errorMessage
} from '../../lib/errors/analysis-errors.js';
import { RATING_MAX, RATING_MIN } from '../../config/index.js';
import type { CategorizedPois } from '../pois/poi.types.js';
import { buildSummaryMessages } from './summary.prompt.js';

export interface AreaSummary {
  summary: string;
  rating: number;
}

export const EMPTY_SUMMARY: Readonly<AreaSummary> = Object.freeze({ summary: '', rating: 0 });

/** Models sometimes quote the number; anything non-finite is rejected. */
const SummaryReplySchema = z.object({
  summary: z.string().default(''),
  ai_rating: z.coerce.number().finite().default(0)
});

export function clampRating(value: number): number {
  return Math.min(RATING_MAX, Math.max(RATING_MIN, Math.round(value)));
}

/**
 * @throws EnrichmentParseError
 */
export function parseSummaryReply(text: string): AreaSummary {
  const extracted = extractJsonBlock(text);
  if (!extracted.ok) {
    throw new EnrichmentParseError(`Summary reply contained ${extracted.reason}`);
  }
  const parsed = SummaryReplySchema.safeParse(extracted.value);
  if (!parsed.success) {
    throw new EnrichmentParseError('Summary reply had an unexpected shape');
  }
  return { summary: parsed.data.summary.trim(), rating: clampRating(parsed.data.ai_rating) };
}

export class SummaryService {
  constructor(
    private readonly llm: LLMProvider | null,
    private readonly logger: Logger
  ) {}

  /**
   * @throws EnrichmentUnavailable when no provider is configured or the call fails
   * @throws EnrichmentParseError when the reply cannot be used
   */
  async summarize(area: string, city: string, pois: CategorizedPois): Promise<AreaSummary> {
    if (!this.llm) {
      throw new EnrichmentUnavailable('No LLM provider configured');
    }

    let text: string;
    try {
      text = await this.llm.complete(buildSummaryMessages(area, city, pois));
    } catch (err) {
      throw new EnrichmentUnavailable(`LLM API Error: ${errorMessage(err)}`, { cause: err });
    }

    const result = parseSummaryReply(text);
    this.logger.info({ event: 'summary_ok', rating: result.rating, chars: result.summary.length }, '[Summary] Narrative generated');
    return result;
  }

  /**
   * Same as {@link summarize} but degrades to an empty summary and a 0 rating.
   */
  async summarizeOrEmpty(area: string, city: string, pois: CategorizedPois): Promise<AreaSummary> {
    try {
      return await this.summarize(area, city, pois);
    } catch (err) {
      this.logger.warn({ event: 'summary_degraded', error: errorMessage(err) }, '[Summary] Using empty summary');
      return { ...EMPTY_SUMMARY };
    }
  }
}
