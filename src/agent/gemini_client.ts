import { GoogleGenerativeAI } from '@google/generative-ai';
import type { HubConfig } from '../config.js';

export interface GeminiOptions {
  maxOutputTokens: number;
  temperature: number;
}

export function buildGemini(config: Pick<HubConfig, 'GEMINI_API_KEY' | 'GEMINI_MODEL'>, options: Partial<GeminiOptions> = {}) {
  const opts: GeminiOptions = { maxOutputTokens: 64, temperature: 0.2, ...options };
  if (!config.GEMINI_API_KEY) throw new Error('Missing GEMINI_API_KEY');
  const genAI = new GoogleGenerativeAI(config.GEMINI_API_KEY);
  const model = genAI.getGenerativeModel({
    model: config.GEMINI_MODEL,
    generationConfig: { maxOutputTokens: opts.maxOutputTokens, temperature: opts.temperature },
  });
  return { model, opts };
}
