import { EMOTION_TAGS, MEMORY_TYPES } from '../decoder/tags.js';
import { GESTURE_ALIASES, PRIMITIVE_ARITY } from '../motion/compiler.js';
import type { HistoryEntry, MediaKind, TurnInput } from './backend.js';

export const SUMMARY_PREFIX = '[SUMMARY] ';

export function buildRespondSystemPrompt(): string {
  return [
    'You are a small companion robot that talks with the people living in a home.',
    'Answer in the language the person uses. Keep replies short and warm: one to three sentences.',
    '',
    'Output contract (hard rules):',
    '- Start every reply with [emotion:TAG], where TAG is one of:',
    `  ${EMOTION_TAGS.join(', ')}.`,
    '- Optionally follow it with [emojis:CODE,CODE] using Unicode code points such as 1F600 or 2764.',
    '- Optionally follow that with [actions:step|step] to move. A step is name:params:duration_ms.',
    `  Primitives: ${Object.entries(PRIMITIVE_ARITY)
      .map(([name, arity]) => (arity > 0 ? `${name}(${arity} params)` : name))
      .join(', ')}.`,
    `  Gestures: ${Object.keys(GESTURE_ALIASES).join(', ')}.`,
    '- Then write the spoken reply as plain text.',
    '',
    'Side-effect tags you may place anywhere in the reply; they are never spoken:',
    `- [memory:TYPE:fact] to remember something. TYPE is one of ${MEMORY_TYPES.join(', ')}.`,
    '- [person_name:NAME] when someone tells you their name.',
    '- [zone_learn:name:category:description] when you learn about a place.',
    '  category is one of kitchen, living, bedroom, bathroom, unknown.',
    'Never store passwords, card or bank numbers, identity documents, addresses or health details.',
  ].join('\n');
}

function mediaLabel(kind: MediaKind): string {
  if (kind === 'audio') {
    return 'a voice recording';
  }

  return kind === 'image' ? 'a photo' : 'a video';
}

function renderHistory(history: HistoryEntry[]): string {
  if (history.length === 0) {
    return '(no previous messages)';
  }

  return history.map((entry) => `${entry.role}: ${entry.content}`).join('\n');
}

export function buildTurnPrompt(input: TurnInput): string {
  const lines: string[] = [];

  if (input.media.length > 0) {
    lines.push(`The person sent ${input.media.map((part) => mediaLabel(part.kind)).join(' and ')}.`);
    lines.push(
      'After your reply, append [media_summary: what the person said or showed], written as a short sentence.',
    );
  }

  if (input.text) {
    lines.push(input.text);
  }

  return lines.join('\n');
}

export function buildRespondUserPrompt(input: { context: string; history: HistoryEntry[]; turn: TurnInput }): string {
  return [
    'context:',
    input.context || '(nothing remembered yet)',
    '',
    'conversation so far:',
    renderHistory(input.history),
    '',
    'new message:',
    buildTurnPrompt(input.turn) || '(empty)',
  ].join('\n');
}

export function buildExplorationInstruction(input: { durationMinutes: number; zoneName: string | null }): string {
  return [
    `Explore the home on your own for about ${input.durationMinutes} minutes.`,
    input.zoneName ? `You are currently in: ${input.zoneName}.` : 'You do not know where you are yet.',
    'Reply with [emotion:curious], an [actions:...] tag with the moves to make, and one short sentence to say',
    'out loud while exploring. Use [zone_learn:...] for any place you expect to find.',
  ].join('\n');
}

export function buildCompactionSystemPrompt(options: { toolName?: string } = {}): string {
  return [
    'You compact the conversation history of a home companion robot.',
    options.toolName
      ? `You must call the tool \`${options.toolName}\` exactly once.`
      : 'Reply with the summary paragraph only.',
    '',
    'Output contract (hard rules):',
    '- One paragraph, at most 120 words, in the language of the conversation.',
    '- Keep names, preferences, plans and open questions.',
    '- Drop greetings, filler and anything already resolved.',
  ].join('\n');
}

export function buildCompactionUserPrompt(messages: HistoryEntry[]): string {
  return [
    'Summarize the following older messages.',
    `message_count: ${messages.length}`,
    'messages:',
    renderHistory(messages),
  ].join('\n');
}
