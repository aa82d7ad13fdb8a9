import OpenAI from 'openai';
import { logger as rootLogger, Logger } from '../lib/logger';
import { AssessmentServiceError } from '../lib/errors';
import { CHAT_CLOSING_LINE, CHAT_SYSTEM_MESSAGE } from '../config/assessment';
import type { AssessmentResult, RiskAssessor } from '../types/assessment';
import type { MetadataRecord } from '../types/repository';
import { renderDocument } from './document';

export type ChatMessage = { role: 'system' | 'user'; content: string };

export type OpenAIClientOptions = {
  apiKey?: string;
  baseURL?: string;
  maxRetries?: number;
  timeoutMs?: number;
};

/** The SDK's own retry loop is the only retry applied to outbound model calls. */
export function createOpenAIClient(opts: OpenAIClientOptions): OpenAI {
  return new OpenAI({
    apiKey: opts.apiKey,
    baseURL: opts.baseURL,
    maxRetries: opts.maxRetries ?? 2,
    timeout: opts.timeoutMs ?? 30000
  });
}

export function buildChatMessages(record: MetadataRecord, systemMessage = CHAT_SYSTEM_MESSAGE): ChatMessage[] {
  const userMessage = `Classify this AI system by EU AI Act risk level:

${renderDocument(record)}

${CHAT_CLOSING_LINE}`;
  return [
    { role: 'system', content: systemMessage },
    { role: 'user', content: userMessage }
  ];
}

export function rawPromptForDebug(messages: ChatMessage[]) {
  if (process.env.NODE_ENV === 'production') return '[redacted]';
  return messages.map((m) => `(${m.role}) ${m.content.slice(0, 300)}...`).join('\n---\n');
}

export type ChatRiskAssessorOptions = {
  client: OpenAI;
  model: string;
  systemMessage?: string;
  logger?: Logger;
};

/**
 * Single chat completion with no retrieval; the verdict carries no citations.
 * Used when no assistant is configured.
 */
export class ChatRiskAssessor implements RiskAssessor {
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly systemMessage: string;
  private readonly logger: Logger;

  constructor(opts: ChatRiskAssessorOptions) {
    this.client = opts.client;
    this.model = opts.model;
    this.systemMessage = opts.systemMessage ?? CHAT_SYSTEM_MESSAGE;
    this.logger = opts.logger ?? rootLogger;
  }

  async assess(record: MetadataRecord): Promise<AssessmentResult> {
    const log = this.logger.child({ repository: record.repository, model: this.model });
    const messages = buildChatMessages(record, this.systemMessage);
    if (process.env.NODE_ENV !== 'production') {
      log.debug({ promptPreview: rawPromptForDebug(messages) }, 'LLM prompt');
    }
    const res = await this.client.chat.completions.create({ model: this.model, messages });
    const text = res.choices[0]?.message?.content?.trim() ?? '';
    if (!text) throw new AssessmentServiceError('empty_completion');
    if (process.env.NODE_ENV !== 'production') {
      log.debug({ responsePreview: text.slice(0, 500) }, 'LLM raw response');
    }
    return { verdictText: text, citations: [] };
  }
}

export default ChatRiskAssessor;
