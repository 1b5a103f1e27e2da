import {
  classificationPrompt,
  stepProposalPrompt,
  synthesisSystemPrompt,
  synthesisUserPrompt,
  tagPrompt,
} from "../core/prompts.js";
import type {
  ClassificationInput,
  ProviderConfig,
  StepProposalInput,
  SynthesisInput,
  TagSubject,
} from "../core/types.js";
import type { ReasoningEnginePort } from "../ports/reasoning-engine.js";
import { complete } from "./openrouter-client.js";

const TERSE_SYSTEM = "You are a precise assistant for a code search tool. Follow the requested output format exactly.";

/** Reasoning engine backed by OpenRouter chat completions. */
export class OpenRouterEngine implements ReasoningEnginePort {
  constructor(
    private readonly config: ProviderConfig,
    private readonly apiKey: string,
  ) {}

  classify(input: ClassificationInput, signal?: AbortSignal): Promise<string> {
    return complete(TERSE_SYSTEM, classificationPrompt(input), this.config.fastModel, this.apiKey, {
      baseUrl: this.config.baseUrl,
      signal,
      temperature: 0,
    });
  }

  synthesize(input: SynthesisInput, signal?: AbortSignal): Promise<string> {
    return complete(synthesisSystemPrompt(input), synthesisUserPrompt(input), this.config.model, this.apiKey, {
      baseUrl: this.config.baseUrl,
      signal,
    });
  }

  describe(subjects: TagSubject[], signal?: AbortSignal): Promise<string> {
    return complete(TERSE_SYSTEM, tagPrompt(subjects), this.config.fastModel, this.apiKey, {
      baseUrl: this.config.baseUrl,
      signal,
      temperature: 0,
    });
  }

  proposeSteps(input: StepProposalInput, signal?: AbortSignal): Promise<string> {
    return complete(TERSE_SYSTEM, stepProposalPrompt(input), this.config.fastModel, this.apiKey, {
      baseUrl: this.config.baseUrl,
      signal,
      temperature: 0,
    });
  }
}
