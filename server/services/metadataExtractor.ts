import { errorMessage } from '../errors';
import { logger } from '../logger';
import type { TextModel } from './geminiService';

export const METADATA_ERROR_PREFIX = 'AI metadata generation error: ';
export const EXCERPT_MAX_CHARS = 1500;

export const buildMetadataPrompt = (bookContent: string) => `
Analyze the following book content and extract the information below, one heading per item.
- Characters / main cast
- Key events and conflict
- Historical era and setting
- Emotional elements (love and hate, loneliness, and so on)
- Screen adaptations (film, drama, webtoon and so on, including the platform name)
- Review (short summary)
- External links (if any)
[Book content]
${bookContent.slice(0, EXCERPT_MAX_CHARS)}
`;

/**
 * Returns the model's raw text. Failures come back as a readable string
 * starting with METADATA_ERROR_PREFIX so the search pipeline keeps going.
 */
export async function generateMetadata(model: TextModel, bookContent: string): Promise<string> {
  try {
    return await model.generate(buildMetadataPrompt(bookContent));
  } catch (error) {
    logger.warn(`⚠️ Metadata generation failed: ${errorMessage(error)}`);
    return `${METADATA_ERROR_PREFIX}${errorMessage(error)}`;
  }
}
