export const GREETING_MESSAGE = 'Hello! I am Verity. Provide a claim to verify.';

export const GENERAL_QUESTION_MESSAGE = 'I am Verity. I only verify news claims.';

export const NO_INPUT_MESSAGE = 'Error: No input provided.';

export const NO_IMAGE_TEXT_MESSAGE = 'Error: No text read from image.';

export const SEARCH_UNAVAILABLE_MESSAGE =
  'Error: Could not fetch search results. Check API keys or quota.';

export const ANALYSIS_UNAVAILABLE_MESSAGE =
  'Search results were fetched, but no language model API key is configured for analysis.';

export const INTERNAL_ERROR_MESSAGE =
  'Error: Something went wrong while verifying the claim. Please try again.';

export function analysisErrorMessage(error: Error): string {
  return `Analysis error: ${error.message}`;
}
