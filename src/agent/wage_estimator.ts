import { z } from 'zod';
import { buildGemini } from './gemini_client.js';
import { recordLLMCall } from './llm_instrumentation.js';
import { roundCurrency } from '../engine/value.js';
import type { HubConfig } from '../config.js';

export interface WageEstimateRequest {
  title: string;
  description: string;
  location: string;
}

/** Suggests an hourly wage for a task; resolves null when it has no answer. */
export interface WageEstimator {
  estimate(req: WageEstimateRequest): Promise<number | null>;
}

/** The slice of a generative model the estimator needs. */
export interface TextModel {
  generateContent(prompt: string): Promise<{ response: { text(): string } }>;
}

const answerSchema = z.object({ hourly_rate: z.coerce.number().positive() });

export function buildWagePrompt(req: WageEstimateRequest): string {
  return [
    'Estimate a fair local market hourly wage, in the local currency, for paid work equivalent to this volunteer task.',
    `Title: ${req.title}`,
    `Description: ${req.description}`,
    `Location: ${req.location}`,
    'Reply with ONLY JSON of the form {"hourly_rate": <number>}.',
  ].join('\n');
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    if (err instanceof SyntaxError) return undefined;
    throw err;
  }
}

/**
 * Reads the model's answer: a JSON object first (fences allowed), otherwise the
 * first number in the text. Non-positive answers count as no answer.
 */
export function parseWageAnswer(text: string): number | null {
  const body = text.trim().replace(/^```(?:json)?\s*/i, '').replace(/\s*```$/, '');
  const json = parseJson(body);
  if (typeof json === 'object' && json !== null) {
    const parsed = answerSchema.safeParse(json);
    return parsed.success ? roundCurrency(parsed.data.hourly_rate) : null;
  }
  const m = /-?\d+(?:\.\d+)?/.exec(body.replace(/(\d),(?=\d{3}\b)/g, '$1'));
  if (!m) return null;
  const n = Number(m[0]);
  return n > 0 ? roundCurrency(n) : null;
}

export class GeminiWageEstimator implements WageEstimator {
  private readonly model: TextModel;

  constructor(
    private readonly config: Pick<HubConfig, 'GEMINI_API_KEY' | 'GEMINI_MODEL' | 'LLM_TIMEOUT_MS'>,
    model?: TextModel,
  ) {
    this.model = model ?? buildGemini(config).model;
  }

  async estimate(req: WageEstimateRequest): Promise<number | null> {
    const prompt = buildWagePrompt(req);
    const startedAt = Date.now();
    let timer: NodeJS.Timeout | undefined;
    try {
      const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new Error('LLM_TIMEOUT')), this.config.LLM_TIMEOUT_MS);
      });
      const result = await Promise.race([this.model.generateContent(prompt), timeout]);
      const raw = result.response.text();
      const rate = parseWageAnswer(raw);
      recordLLMCall('wage.estimate', startedAt, { parsed: rate !== null });
      return rate;
    } catch (err) {
      recordLLMCall('wage.estimate', startedAt, { error: err });
      console.warn('[wage] estimate failed:', err instanceof Error ? err.message : String(err));
      return null;
    } finally {
      clearTimeout(timer);
    }
  }
}
