/**
 * Core data types for the conversation orchestrator
 */

export interface ConversationThread {
  userId: string;
  threadId: string;    // opaque handle from the LLM provider
  createdAt: number;
}

/** Run states; `timed_out` is imposed locally and never reported by the provider */
export type RunState =
  | 'created'
  | 'queued'
  | 'in_progress'
  | 'requires_action'
  | 'completed'
  | 'failed'
  | 'cancelled'
  | 'timed_out';

/** States the provider can report back on a status poll */
export type ProviderRunStatus = Exclude<RunState, 'created' | 'timed_out'>;

export interface ToolCall {
  callId: string;
  functionName: string;
  arguments: unknown;   // parsed JSON when the provider sent valid JSON, raw text otherwise
}

export interface ToolOutput {
  callId: string;
  outputText: string;
}

export interface RunSnapshot {
  runId: string;
  threadId: string;
  status: ProviderRunStatus;
  requestedToolCalls: ToolCall[];
  lastError?: string;
}

/**
 * External reasoning engine. Implementations throw NotFoundError for stale
 * thread ids, ProviderTransientError for hiccups and ProviderFatalError otherwise.
 */
export interface LlmProvider {
  createThread(): Promise<string>;
  appendMessage(threadId: string, text: string): Promise<void>;
  createRun(threadId: string): Promise<string>;
  getRunStatus(threadId: string, runId: string): Promise<RunSnapshot>;
  submitToolOutputs(threadId: string, runId: string, outputs: ToolOutput[]): Promise<void>;
  getLatestAssistantMessage(threadId: string): Promise<string | null>;
}

export interface ThreadStore {
  get(userId: string): Promise<ConversationThread | null>;
  save(thread: ConversationThread): Promise<void>;
  count(): Promise<number>;
  close(): void;
}

export type TurnOutcome =
  | { kind: 'completed'; text: string; runId: string }
  | { kind: 'failed' | 'cancelled' | 'timed_out' | 'error'; notice: string; runId?: string };

export interface ToolContext {
  userId: string;
}
