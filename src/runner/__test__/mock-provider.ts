/**
 * In-process Provider for tests. Replies come from a queue, or from a
 * responder function when the queue is empty.
 */
import type {
  FinishReason,
  InvokeParams,
  LLMMessage,
  Provider,
  ProviderResponse,
  ProviderUsage,
} from '../llm-adapter.ts';
import { sleep } from '../retry.ts';

export interface MockReply {
  text?: string;
  finish_reason?: FinishReason;
  usage?: Partial<ProviderUsage>;
  /** Resolve only after this many ms (abortable) */
  delayMs?: number;
  /** Reject with this instead of replying */
  error?: Error;
}

export interface MockCall {
  messages: LLMMessage[];
  params: InvokeParams;
}

export type MockResponder = (
  messages: LLMMessage[],
  params: InvokeParams,
  callIndex: number
) => MockReply | string | Promise<MockReply | string>;

export const MOCK_USAGE: ProviderUsage = {
  prompt_tokens: 10,
  completion_tokens: 5,
  cost_estimate: 0.001,
};

export class MockProvider implements Provider {
  readonly calls: MockCall[] = [];
  private readonly queue: (MockReply | string)[] = [];
  private inFlight = 0;
  /** Highest number of concurrent invocations seen */
  maxInFlight = 0;

  constructor(private readonly responder: MockResponder = () => 'mock response') {}

  static scripted(...replies: (MockReply | string)[]): MockProvider {
    return new MockProvider().enqueue(...replies);
  }

  enqueue(...replies: (MockReply | string)[]): this {
    this.queue.push(...replies);
    return this;
  }

  /** Text of the last user message of call `index` */
  prompt(index: number): string | undefined {
    const messages = this.calls[index]?.messages ?? [];
    return messages.filter((m) => m.role === 'user').at(-1)?.content;
  }

  async invoke(messages: LLMMessage[], params: InvokeParams): Promise<ProviderResponse> {
    const callIndex = this.calls.length;
    this.calls.push({ messages: messages.map((m) => ({ ...m })), params });

    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      const next = this.queue.shift() ?? (await this.responder(messages, params, callIndex));
      const reply: MockReply = typeof next === 'string' ? { text: next } : next;

      if (reply.delayMs) await sleep(reply.delayMs, params.signal);
      if (reply.error) throw reply.error;

      return {
        text: reply.text ?? '',
        finish_reason: reply.finish_reason ?? 'stop',
        usage: { ...MOCK_USAGE, ...reply.usage },
      };
    } finally {
      this.inFlight--;
    }
  }
}
