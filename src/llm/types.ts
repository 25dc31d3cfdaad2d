import { StageName } from '../config/types';

// ─── Provider Names ───────────────────────────────────────────────
export type ReasoningProviderName = 'openai' | 'anthropic';

export const REASONING_PROVIDERS: readonly ReasoningProviderName[] = ['openai', 'anthropic'];

// ─── Provider Configuration ───────────────────────────────────────
export interface ReasoningProviderConfig {
  apiKey: string;
  model: string;
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
}

export interface ReasoningMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

// ─── Completion Request / Response ────────────────────────────────
export interface CompletionRequest {
  messages: ReasoningMessage[];
  temperature: number;
  maxTokens: number;
  /** Hint providers to produce JSON output */
  jsonMode: boolean;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface CompletionResponse {
  /** Raw text from the model (JSON-parseable when jsonMode was true, if the model complied) */
  content: string;
  model: string;
  provider: ReasoningProviderName;
  usage: TokenUsage;
  latencyMs: number;
}

// ─── Provider Interface ───────────────────────────────────────────
export interface ReasoningProvider {
  readonly name: ReasoningProviderName;
  readonly model: string;

  /**
   * Send a completion request and return the response.
   * Implementations map the generic message format to the provider API.
   */
  complete(request: CompletionRequest): Promise<CompletionResponse>;

  /** Lightweight connectivity check */
  healthCheck(): Promise<boolean>;
}

export interface ProviderRouterConfig {
  primaryProvider: ReasoningProviderName;
  secondaryProvider?: ReasoningProviderName;
}

// ─── Engine facade used by stages ─────────────────────────────────
export interface InferenceRequest {
  stage: StageName;
  sessionId: string;
  /** Stage instructions */
  instructions: string;
  /** Rendered ticket context (classification, articles, account data) */
  context: string;
  /** The customer's message for this turn */
  customerMessage: string;
  /** JSON schema the reply must satisfy; presence implies JSON mode */
  responseSchema?: Record<string, unknown>;
}

export interface InferenceResult {
  content: string;
  provider: string;
  model: string;
}

/** The generative reasoning collaborator. Fails with ReasoningUnavailableError. */
export interface ReasoningEngine {
  infer(request: InferenceRequest): Promise<InferenceResult>;
}
