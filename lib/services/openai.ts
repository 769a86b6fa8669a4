import OpenAI from 'openai';
import { ExtractionError, describeError } from '../errors';
import type { GenerationOptions, TextGenerator } from '../types';

const SYSTEM_PROMPT = `You are a professional career analyst. Your task is to analyze public profile information and identify relevant professional interests and expertise areas.

Answer with a short list of interest tags only, separated by commas. Never answer in full sentences.`;

export class OpenAIService implements TextGenerator {
  private client: OpenAI;

  constructor(apiKey: string, private model: string) {
    this.client = new OpenAI({ apiKey });
  }

  async generate(prompt: string, options: GenerationOptions): Promise<string> {
    let response: OpenAI.ChatCompletion;

    try {
      response = await this.client.chat.completions.create({
        model: this.model,
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: prompt },
        ],
        temperature: options.temperature,
        max_tokens: options.maxTokens,
      });
    } catch (error) {
      console.error('[OPENAI] Completion error:', describeError(error));
      throw new ExtractionError(`Text generation failed: ${describeError(error)}`, { cause: error });
    }

    const content = response.choices?.[0]?.message?.content;
    if (typeof content !== 'string') {
      throw new ExtractionError('Text generation returned no message content');
    }

    return content;
  }
}
