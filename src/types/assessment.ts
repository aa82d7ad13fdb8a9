import type { MetadataRecord } from './repository';

export type RunStatus =
  | 'created'
  | 'queued'
  | 'in_progress'
  | 'requires_action'
  | 'cancelling'
  | 'cancelled'
  | 'failed'
  | 'completed'
  | 'incomplete'
  | 'expired';

export interface RunState {
  id: string;
  status: RunStatus | string;
  lastError?: string;
}

export interface RunStepSummary {
  id: string;
  fileSearchCallIds: string[]; // empty for steps with no retrieval
}

export interface EvidenceChunk {
  text: string;
  score: number;
  fileName?: string;
}

export interface CitationAnnotation {
  marker: string;     // literal text, e.g. 【4:0†source】
  startIndex: number;
  endIndex: number;
}

export interface GeneratedMessage {
  text: string;
  annotations: CitationAnnotation[];
}

export interface CitationRecord {
  marker: string;
  evidenceText: string;
  relevanceScore: number;
  sourceName?: string;
}

export interface AssessmentResult {
  verdictText: string;
  citations: CitationRecord[];
}

/** 'first-call': first retrieval call only. 'all-calls': every retrieval call, concatenated in order. */
export type EvidenceScope = 'first-call' | 'all-calls';

/**
 * Retrieval-augmented generation service driven as a thread of messages
 * and runs against a pre-configured assistant.
 */
export interface GenerationService {
  createThread(): Promise<string>;
  addUserMessage(threadId: string, content: string): Promise<void>;
  startRun(threadId: string, instructions?: string): Promise<RunState>;
  getRun(threadId: string, runId: string): Promise<RunState>;
  cancelRun(threadId: string, runId: string): Promise<void>;
  listRunSteps(threadId: string, runId: string): Promise<RunStepSummary[]>;
  // chunk lists per retrieval call, in call order, with chunk bodies included
  getRetrievedEvidence(threadId: string, runId: string, stepId: string): Promise<EvidenceChunk[][]>;
  getAssistantMessage(threadId: string, runId: string): Promise<GeneratedMessage | null>;
}

export interface RiskAssessor {
  assess(record: MetadataRecord): Promise<AssessmentResult>;
}
