/**
 * Answer generation collaborator
 *
 * The pipeline only depends on the `AnswerGenerator` contract: one prompt
 * in, one answer out. The default implementation talks to a Groq chat model
 * through the AI SDK; tests and other deployments inject their own.
 */

import { generateText } from 'ai';
import { createGroq } from '@ai-sdk/groq';
import type { GraphRagConfig } from '../config/index.js';
import {
  ErrorCategory,
  ErrorHandler,
  ErrorSeverity,
  GenerationTimeoutError,
  toError
} from '../utils/error-handler.js';

export interface GenerateOptions {
  abortSignal?: AbortSignal;
}

export interface AnswerGenerator {
  /** Human-readable provider/model label for traces */
  readonly name: string;
  generate(prompt: string, options?: GenerateOptions): Promise<string>;
}

export interface GroqGeneratorOptions {
  apiKey: string;
  model: string;
  temperature?: number;
}

export class GroqAnswerGenerator implements AnswerGenerator {
  readonly name: string;
  private provider: ReturnType<typeof createGroq>;
  private model: string;
  private temperature: number;

  constructor(options: GroqGeneratorOptions) {
    if (!options.apiKey) {
      throw new Error('Groq API key is required');
    }
    this.provider = createGroq({ apiKey: options.apiKey });
    this.model = options.model;
    this.temperature = options.temperature ?? 0;
    this.name = `groq/${options.model}`;
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    const { text } = await generateText({
      model: this.provider(this.model),
      prompt,
      temperature: this.temperature,
      abortSignal: options.abortSignal
    });
    return text;
  }
}

/**
 * Generator wiring plus the capability flag the pipeline reports
 */
export interface GeneratorSetup {
  generator: AnswerGenerator | null;
  available: boolean;
}

/**
 * Build the default generator from configuration
 *
 * A missing key or a failing client constructor disables generation; it is
 * logged, never thrown.
 */
export function createAnswerGenerator(config: Pick<GraphRagConfig, 'groqApiKey' | 'model'>): GeneratorSetup {
  if (!config.groqApiKey) {
    console.warn('⚠️ GROQ_API_KEY not set. LLM features disabled.');
    return { generator: null, available: false };
  }

  try {
    const generator = new GroqAnswerGenerator({ apiKey: config.groqApiKey, model: config.model });
    return { generator, available: true };
  } catch (error) {
    ErrorHandler.handle(
      ErrorCategory.CONFIGURATION,
      ErrorSeverity.HIGH,
      'Failed to initialize answer generator',
      toError(error),
      { model: config.model },
      'Check GROQ_API_KEY and GRAPHRAG_MODEL'
    );
    return { generator: null, available: false };
  }
}

/**
 * Assemble the generation prompt from the grounding context and question
 */
export function buildPrompt(context: string, question: string): string {
  return `You are a helpful assistant answering questions based on a knowledge graph.
Use ONLY the provided context to answer. Be concise and direct.
If the context doesn't contain enough information, say so.

Context from knowledge graph:
${context}

Question: ${question}

Answer:`;
}

/**
 * Call a generator with a deadline
 *
 * The abort signal is raised when the deadline passes, and the returned
 * promise rejects even if the generator ignores it. Blank answers are
 * treated as malformed responses.
 */
export async function generateWithTimeout(
  generator: AnswerGenerator,
  prompt: string,
  timeoutMs: number
): Promise<string> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new GenerationTimeoutError(timeoutMs));
    }, timeoutMs);
  });

  try {
    const answer = await Promise.race([
      generator.generate(prompt, { abortSignal: controller.signal }),
      deadline
    ]);

    if (typeof answer !== 'string' || answer.trim().length === 0) {
      throw new Error('Generation service returned an empty response');
    }

    return answer.trim();
  } finally {
    clearTimeout(timer);
  }
}
