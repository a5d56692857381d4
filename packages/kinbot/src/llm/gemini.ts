import { GoogleGenAI, type Content, type Part } from '@google/genai';

import type { ModelConfig } from '../config.js';
import {
  BackendError,
  type GenerateRequest,
  type GenerativeBackend,
  type HistoryEntry,
  type SummarizeRequest,
} from './backend.js';
import {
  buildCompactionSystemPrompt,
  buildCompactionUserPrompt,
  buildRespondSystemPrompt,
  buildTurnPrompt,
} from './prompts.js';

function toContent(entry: HistoryEntry): Content {
  return {
    role: entry.role === 'assistant' ? 'model' : 'user',
    parts: [{ text: entry.content }],
  };
}

/** Multimodal turns through @google/genai; audio, images and video go inline as base64. */
export class GeminiBackend implements GenerativeBackend {
  public readonly name = 'gemini';

  private readonly config: ModelConfig;
  private readonly ai: GoogleGenAI;

  constructor(config: ModelConfig, apiKey: string) {
    this.config = config;
    this.ai = new GoogleGenAI({ apiKey });
  }

  async *stream(request: GenerateRequest): AsyncIterable<string> {
    const turnParts: Part[] = request.input.media.map((part) => ({
      inlineData: {
        mimeType: part.mimeType,
        data: part.data.toString('base64'),
      },
    }));

    const turnText = buildTurnPrompt(request.input);
    if (turnText) {
      turnParts.push({ text: turnText });
    }

    const systemInstruction = request.context
      ? `${buildRespondSystemPrompt()}\n\ncontext:\n${request.context}`
      : buildRespondSystemPrompt();

    const response = await this.ai.models.generateContentStream({
      model: this.config.id,
      contents: [...request.history.map(toContent), { role: 'user', parts: turnParts }],
      config: {
        systemInstruction,
        temperature: this.config.temperature,
        maxOutputTokens: this.config.maxOutputTokens,
      },
    });

    for await (const chunk of response) {
      const text = chunk.text;
      if (text) {
        yield text;
      }
    }
  }

  async summarize(request: SummarizeRequest): Promise<string> {
    let text: string | undefined;

    try {
      const response = await this.ai.models.generateContent({
        model: this.config.id,
        contents: [{ role: 'user', parts: [{ text: buildCompactionUserPrompt(request.messages) }] }],
        config: {
          systemInstruction: buildCompactionSystemPrompt(),
          temperature: 0.2,
        },
      });
      text = response.text;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new BackendError(`Compaction model request failed: ${message}`);
    }

    const summary = text?.trim() ?? '';
    if (!summary) {
      throw new BackendError('Compaction model returned an empty summary.');
    }

    return summary;
  }
}
