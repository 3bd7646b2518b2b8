export type Intent = 'greeting' | 'fact_checking_claim' | 'general_question';

export const VERDICT_LABELS = [
  'Factually True',
  'Factually False',
  'Misleading',
  'Unverified',
] as const;

export type VerdictLabel = (typeof VERDICT_LABELS)[number];

export interface SearchResult {
  readonly title: string;
  readonly url: string;
  readonly snippet: string;
}

export interface EvidenceEntry {
  readonly result: SearchResult;
  /** Paragraph text of the page; empty when the fetch failed. */
  readonly body: string;
}

export interface EvidenceBundle {
  readonly entries: readonly EvidenceEntry[];
  readonly sourceUrls: readonly string[];
}

export interface VerificationInput {
  readonly userText?: string;
  readonly imageBytes?: Buffer;
}
