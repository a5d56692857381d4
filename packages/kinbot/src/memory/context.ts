import type { ContextBundle, Memory } from '../store/memory.js';
import type { Zone } from '../store/zones.js';

export interface ContextInput {
  bundle: ContextBundle;
  personId: string | null;
  personName: string | null;
  zone: Zone | null;
}

function formatMemory(memory: Memory): string {
  return `- (${memory.memoryType}, importance ${memory.importance}) ${memory.content}`;
}

function section(title: string, memories: Memory[]): string[] {
  if (memories.length === 0) {
    return [];
  }

  return [title, ...memories.map(formatMemory), ''];
}

/** Renders the memory bundle as the plain-text context block passed with every turn. */
export function buildContextText(input: ContextInput): string {
  const lines: string[] = [];

  if (input.personId) {
    lines.push(`Current person: ${input.personName ?? input.personId} (id ${input.personId})`, '');
  }

  if (input.zone) {
    const description = input.zone.description ? `: ${input.zone.description}` : '';
    lines.push(`Current location: ${input.zone.name} [${input.zone.category}]${description}`, '');
  }

  lines.push(
    ...section('Things worth remembering:', input.bundle.general),
    ...section('About this person:', input.bundle.person),
    ...section('About this place:', input.bundle.zone),
  );

  return lines.join('\n').trim();
}
