import { CustomerDirectory } from '../customers/types';
import { KnowledgeSearch } from '../knowledge/types';
import { ReasoningEngine } from '../llm/types';
import { TicketingService } from '../ticketing/types';
import { ClassifierStage } from './classifier';
import { EscalationStage } from './escalation';
import { PromptManager } from './prompt-manager';
import { ResolverStage } from './resolver';
import { RetrieverStage } from './retriever';
import { StageSet } from './types';

export interface StageDependencies {
  engine: ReasoningEngine;
  knowledge: KnowledgeSearch;
  customers: CustomerDirectory;
  tickets: TicketingService;
  prompts: PromptManager;
}

/** Wire the four stages; only the retriever gets knowledge search */
export function createStages(deps: StageDependencies): StageSet {
  return {
    classifier: new ClassifierStage(deps.engine, deps.tickets, deps.prompts),
    retriever: new RetrieverStage(deps.engine, deps.knowledge, deps.prompts),
    resolver: new ResolverStage(deps.engine, deps.tickets, deps.customers, deps.prompts),
    escalation: new EscalationStage(deps.engine, deps.tickets, deps.customers, deps.prompts),
  };
}

export * from './types';
