import { complete, getModel, stream } from '@mariozechner/pi-ai';
import { Value } from '@sinclair/typebox/value';
import { z } from 'zod';

import type { ModelConfig } from '../config.js';
import {
  BackendError,
  UnsupportedMediaError,
  type GenerateRequest,
  type GenerativeBackend,
  type SummarizeRequest,
} from './backend.js';
import {
  buildCompactionSystemPrompt,
  buildCompactionUserPrompt,
  buildRespondSystemPrompt,
  buildRespondUserPrompt,
} from './prompts.js';
import { HISTORY_SUMMARY_TOOL, HISTORY_SUMMARY_TOOL_NAME, HistorySummaryPayloadSchema } from './tools.js';

const TextDeltaEventSchema = z.object({
  type: z.literal('text_delta'),
  delta: z.string(),
});

const ErrorEventSchema = z.object({
  type: z.literal('error'),
  error: z.object({ errorMessage: z.string().optional() }).passthrough().optional(),
});

const AssistantReplySchema = z
  .object({
    stopReason: z.string().optional(),
    errorMessage: z.string().optional(),
    content: z.array(z.unknown()),
  })
  .passthrough();

const ToolCallBlockSchema = z.object({
  type: z.literal('toolCall'),
  name: z.string(),
  arguments: z.unknown(),
});

/** Text and image turns through @mariozechner/pi-ai. Audio and video are refused. */
export class PiAiBackend implements GenerativeBackend {
  public readonly name = 'pi-ai';

  private readonly config: ModelConfig;
  private readonly apiKey: string;

  constructor(config: ModelConfig, apiKey: string) {
    this.config = config;
    this.apiKey = apiKey;
  }

  async *stream(request: GenerateRequest): AsyncIterable<string> {
    const unsupported = request.input.media.find((part) => part.kind !== 'image');
    if (unsupported) {
      throw new UnsupportedMediaError(this.name, unsupported.kind);
    }

    const model = getModel(this.config.provider as never, this.config.id as never);
    const context = {
      systemPrompt: buildRespondSystemPrompt(),
      messages: [
        {
          role: 'user',
          content: [
            {
              type: 'text',
              text: buildRespondUserPrompt({
                context: request.context,
                history: request.history,
                turn: request.input,
              }),
            },
            ...request.input.media.map((part) => ({
              type: 'image',
              data: part.data.toString('base64'),
              mimeType: part.mimeType,
            })),
          ],
          timestamp: Date.now(),
        },
      ],
    };

    const events = stream(model as never, context as never, {
      apiKey: this.apiKey,
      temperature: this.config.temperature,
      maxTokens: this.config.maxOutputTokens,
    });

    for await (const event of events) {
      const delta = TextDeltaEventSchema.safeParse(event);
      if (delta.success) {
        if (delta.data.delta.length > 0) {
          yield delta.data.delta;
        }
        continue;
      }

      const failure = ErrorEventSchema.safeParse(event);
      if (failure.success) {
        throw new BackendError(failure.data.error?.errorMessage || 'Model stream returned an error.');
      }
    }
  }

  async summarize(request: SummarizeRequest): Promise<string> {
    const model = getModel(this.config.provider as never, this.config.id as never);
    const context = {
      systemPrompt: buildCompactionSystemPrompt({ toolName: HISTORY_SUMMARY_TOOL_NAME }),
      messages: [
        {
          role: 'user',
          content: [{ type: 'text', text: buildCompactionUserPrompt(request.messages) }],
          timestamp: Date.now(),
        },
      ],
      tools: [HISTORY_SUMMARY_TOOL],
    };

    let reply: unknown;
    try {
      reply = await complete(model as never, context as never, { apiKey: this.apiKey });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new BackendError(`Compaction model request failed: ${message}`);
    }

    const parsed = AssistantReplySchema.safeParse(reply);
    if (!parsed.success) {
      throw new BackendError('Compaction model returned an unreadable response.');
    }

    if (parsed.data.stopReason === 'error' || parsed.data.stopReason === 'aborted') {
      throw new BackendError(parsed.data.errorMessage || 'Compaction model returned an error response.');
    }

    for (const block of parsed.data.content) {
      const toolCall = ToolCallBlockSchema.safeParse(block);
      if (!toolCall.success || toolCall.data.name !== HISTORY_SUMMARY_TOOL_NAME) {
        continue;
      }

      const args = toolCall.data.arguments;
      if (!Value.Check(HistorySummaryPayloadSchema, args)) {
        throw new BackendError(`Invalid tool arguments from model for ${HISTORY_SUMMARY_TOOL_NAME}.`);
      }

      return args.summary.trim();
    }

    throw new BackendError(`Model did not call required tool: ${HISTORY_SUMMARY_TOOL_NAME}`);
  }
}
