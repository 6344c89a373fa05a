import { GoogleGenerativeAI, type GenerativeModel } from '@google/generative-ai';
import { OracleFailureError } from '../../utils/errors.js';
import type { DisambiguationOracle, DisambiguationRequest } from '../appraisal/disambiguator.js';
import { buildDisambiguationPrompt, parseVerdict } from './prompt.js';

/** The one call the oracle needs from a model: prompt in, text out. */
export interface TextModel {
  generateText(prompt: string, signal?: AbortSignal): Promise<string>;
}

export interface GeminiModelOptions {
  model?: string;
  timeoutMs?: number;
}

export function getGeminiModel(apiKey: string, options: GeminiModelOptions = {}): GenerativeModel {
  const genAI = new GoogleGenerativeAI(apiKey);
  return genAI.getGenerativeModel(
    { model: options.model ?? 'gemini-2.5-flash' },
    { timeout: options.timeoutMs ?? 15_000 },
  );
}

export function geminiTextModel(model: GenerativeModel): TextModel {
  return {
    async generateText(prompt, signal) {
      const result = await model.generateContent(prompt, { signal });
      return result.response.text();
    },
  };
}

export class GeminiOracle implements DisambiguationOracle {
  readonly name = 'gemini';

  constructor(private readonly model: TextModel) {}

  static fromApiKey(apiKey: string, options: GeminiModelOptions = {}): GeminiOracle {
    return new GeminiOracle(geminiTextModel(getGeminiModel(apiKey, options)));
  }

  async selectMatches(request: DisambiguationRequest, signal?: AbortSignal): Promise<number[]> {
    let text: string;
    try {
      text = await this.model.generateText(buildDisambiguationPrompt(request), signal);
    } catch (err) {
      throw new OracleFailureError('generation failed', err);
    }
    return parseVerdict(text);
  }
}
