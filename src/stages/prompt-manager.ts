import * as fs from 'fs';
import * as path from 'path';
import { StageName } from '../config/types';
import { env } from '../config/env';
import { logger } from '../observability/logger';

const STAGE_NAMES: readonly StageName[] = ['classifier', 'retriever', 'resolver', 'escalation'];
const GUIDELINES_FILE = 'guidelines.md';

const FALLBACK_INSTRUCTIONS: Record<StageName, string> = {
  classifier: 'Classify the customer support message by issue type, urgency and sentiment.',
  retriever: 'Judge how well the knowledge base search results answer the customer message.',
  resolver: 'Answer the customer using only the retrieved articles and account context, or request escalation.',
  escalation: 'Write an escalation note for a human agent and a short empathetic message for the customer.',
};

/**
 * Stage instructions loaded from markdown under `prompts/`:
 * `<stage>.md`, prefixed by the shared `guidelines.md` when present.
 */
export class PromptManager {
  private prompts: Map<StageName, string> = new Map();

  constructor(private readonly dir: string = path.join(env.projectRoot, 'prompts')) {
    this.loadAll();
  }

  loadAll(): void {
    this.prompts.clear();
    const guidelines = this.readPromptFile(GUIDELINES_FILE);

    for (const stage of STAGE_NAMES) {
      const body = this.readPromptFile(`${stage}.md`) || FALLBACK_INSTRUCTIONS[stage];
      this.prompts.set(stage, guidelines ? `${guidelines.trim()}\n\n${body.trim()}` : body.trim());
    }
    logger.info({ dir: this.dir, stages: STAGE_NAMES.length }, 'Loaded stage prompts');
  }

  get(stage: StageName): string {
    return this.prompts.get(stage) ?? FALLBACK_INSTRUCTIONS[stage];
  }

  private readPromptFile(filename: string): string {
    const filepath = path.join(this.dir, filename);
    if (!fs.existsSync(filepath)) {
      logger.warn({ filepath }, 'Prompt file not found');
      return '';
    }
    return fs.readFileSync(filepath, 'utf-8');
  }
}
