import type { GenerateRequest, GenerativeBackend, SummarizeRequest } from '../llm/backend.js';
import type { ServerMessage } from '../protocol.js';
import type { SessionTransport } from '../session/session.js';

export type ScriptedTurn = string[] | { fragments: string[]; error: Error };

/** Replays one scripted turn per `stream` call and records every request. */
export class ScriptedBackend implements GenerativeBackend {
  public readonly name = 'scripted';
  public readonly requests: GenerateRequest[] = [];
  public readonly summarizeRequests: SummarizeRequest[] = [];

  private readonly turns: ScriptedTurn[];
  private readonly summarizer: (request: SummarizeRequest) => Promise<string>;

  constructor(
    turns: ScriptedTurn[] = [],
    summarizer: (request: SummarizeRequest) => Promise<string> = async () => 'summary',
  ) {
    this.turns = [...turns];
    this.summarizer = summarizer;
  }

  async *stream(request: GenerateRequest): AsyncIterable<string> {
    this.requests.push(request);
    const turn = this.turns.shift() ?? [];

    if (Array.isArray(turn)) {
      yield* turn;
      return;
    }

    yield* turn.fragments;
    throw turn.error;
  }

  summarize(request: SummarizeRequest): Promise<string> {
    this.summarizeRequests.push(request);
    return this.summarizer(request);
  }
}

export class RecordingTransport implements SessionTransport {
  public readonly sent: ServerMessage[] = [];
  public readonly closed: Array<{ code: number; reason: string }> = [];

  send(message: ServerMessage): void {
    this.sent.push(message);
  }

  close(code: number, reason: string): void {
    this.closed.push({ code, reason });
  }
}
