import type {
  ClassificationInput,
  StepProposalInput,
  SynthesisInput,
  TagSubject,
} from "../core/types.js";

/**
 * The external model behind classification, synthesis and tagging. Methods
 * return the raw reply; parsing and validation happen on the caller's side.
 */
export interface ReasoningEnginePort {
  classify(input: ClassificationInput, signal?: AbortSignal): Promise<string>;
  synthesize(input: SynthesisInput, signal?: AbortSignal): Promise<string>;
  /** One reply describing every subject of the batch. */
  describe(subjects: TagSubject[], signal?: AbortSignal): Promise<string>;
  /** Extra plan steps; engines without planning support leave this out. */
  proposeSteps?(input: StepProposalInput, signal?: AbortSignal): Promise<string>;
}
