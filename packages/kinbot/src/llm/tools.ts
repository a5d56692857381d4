import { Type, type Static } from '@sinclair/typebox';

import type { Tool } from '@mariozechner/pi-ai';

export const HISTORY_SUMMARY_MAX_CHARS = 1_200;

export const HistorySummaryPayloadSchema = Type.Object({
  summary: Type.String({ minLength: 1, maxLength: HISTORY_SUMMARY_MAX_CHARS }),
});

export type HistorySummaryPayload = Static<typeof HistorySummaryPayloadSchema>;

export const HISTORY_SUMMARY_TOOL_NAME = 'commit_history_summary';

export const HISTORY_SUMMARY_TOOL: Tool = {
  name: HISTORY_SUMMARY_TOOL_NAME,
  description: 'Commit the compacted conversation summary. Call exactly once with one concise paragraph.',
  parameters: HistorySummaryPayloadSchema,
};
