import type { HistoryEntry, GenerativeBackend } from '../llm/backend.js';
import { SUMMARY_PREFIX } from '../llm/prompts.js';
import { componentLogger, errorMessage, type Logger } from '../logger.js';
import type { ConversationMessage, ConversationRepository, ConversationRole } from '../store/conversations.js';

export interface ConversationHistoryOptions {
  repository: ConversationRepository;
  backend: GenerativeBackend;
  compactionThreshold: number;
  keepRecent: number;
  logger?: Logger;
}

export type CompactionOutcome = 'below_threshold' | 'in_progress' | 'compacted' | 'failed' | 'stale';

function toHistoryEntry(message: ConversationMessage): HistoryEntry {
  return { role: message.role, content: message.content };
}

export class ConversationHistory {
  private readonly repository: ConversationRepository;
  private readonly backend: GenerativeBackend;
  private readonly compactionThreshold: number;
  private readonly keepRecent: number;
  private readonly log: Logger;
  private readonly compacting = new Set<string>();

  constructor(options: ConversationHistoryOptions) {
    this.repository = options.repository;
    this.backend = options.backend;
    this.compactionThreshold = options.compactionThreshold;
    this.keepRecent = options.keepRecent;
    this.log = options.logger ?? componentLogger('history');
  }

  get(sessionId: string): HistoryEntry[] {
    return this.repository.list(sessionId).map(toHistoryEntry);
  }

  add(sessionId: string, role: ConversationRole, content: string): void {
    this.repository.append(sessionId, role, content);
  }

  sessionsNeedingCompaction(): string[] {
    return this.repository.sessionsAtOrAbove(this.compactionThreshold);
  }

  /**
   * Summarizes everything but the newest `keepRecent` messages once the session reaches the
   * threshold. Never throws; on any failure the stored history is left as it was.
   */
  async compactIfNeeded(sessionId: string): Promise<CompactionOutcome> {
    if (this.compacting.has(sessionId)) {
      return 'in_progress';
    }

    this.compacting.add(sessionId);

    try {
      return await this.compact(sessionId);
    } catch (error) {
      this.log.error({ sessionId, err: errorMessage(error) }, 'history: compaction failed');
      return 'failed';
    } finally {
      this.compacting.delete(sessionId);
    }
  }

  private async compact(sessionId: string): Promise<CompactionOutcome> {
    const messages = this.repository.list(sessionId);
    if (messages.length < this.compactionThreshold) {
      return 'below_threshold';
    }

    const older = messages.slice(0, messages.length - this.keepRecent);
    if (older.length === 0) {
      return 'below_threshold';
    }

    const summary = (await this.backend.summarize({ messages: older.map(toHistoryEntry) })).trim();
    if (!summary) {
      this.log.warn({ sessionId }, 'history: backend returned an empty summary; keeping history');
      return 'failed';
    }

    const replaced = this.repository.replaceWithSummary(
      sessionId,
      older.map((message) => message.id),
      `${SUMMARY_PREFIX}${summary}`,
    );

    if (!replaced) {
      this.log.warn({ sessionId }, 'history: messages changed during compaction; skipping');
      return 'stale';
    }

    this.log.info(
      { sessionId, replaced: older.length, kept: messages.length - older.length },
      'history: compacted conversation',
    );
    return 'compacted';
  }
}
