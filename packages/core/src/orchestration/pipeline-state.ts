import { Annotation } from '@langchain/langgraph';
import type {
  EvidenceBundle,
  Intent,
  SearchResult,
  VerificationInput,
} from '@verity/shared/src/types/verification.types.js';

export const PipelineGraphAnnotation = Annotation.Root({
  requestId: Annotation<string>,
  input: Annotation<VerificationInput>,
  claim: Annotation<string | undefined>,
  intent: Annotation<Intent | undefined>,
  searchResults: Annotation<readonly SearchResult[]>,
  evidence: Annotation<EvidenceBundle | undefined>,
  response: Annotation<string | undefined>,
});

export type PipelineGraphState = typeof PipelineGraphAnnotation.State;
