import { errorMessage, ExtractionError } from '../core/errors.js';
import type { ExtractedMetadata } from '../core/types.js';
import { createLogger } from '../utils/logger.js';
import type { ExtractionClient } from './ExtractionClient.js';
import { buildExtractionPrompt } from './prompt.js';
import { parseExtractionResponse, unknownMetadata } from './responseParser.js';

const logger = createLogger('MetadataExtractor');

/**
 * Metadata Extractor
 *
 * Asks the LLM for APC, frequency, open-access and hybrid status and parses
 * the reply. Extraction never fails a run: a missing key or a failed call
 * yields all-unknown metadata.
 */
export class MetadataExtractor {
  constructor(private client: ExtractionClient) {}

  get provider(): string {
    return this.client.provider;
  }

  async extract(title: string, apiKey: string): Promise<ExtractedMetadata> {
    if (!apiKey.trim()) {
      return unknownMetadata();
    }

    let text: string;
    try {
      text = await this.client.generate(buildExtractionPrompt(title), apiKey);
    } catch (error) {
      const failure = new ExtractionError(
        this.client.provider,
        `Metadata extraction failed for "${title}": ${errorMessage(error)}`,
        { cause: error }
      );
      logger.warn(failure.message, { provider: failure.provider, model: this.client.model });
      return unknownMetadata();
    }

    const metadata = parseExtractionResponse(text);
    logger.debug('Extraction response parsed', { journal: title, ...metadata, raw: text });
    return metadata;
  }
}
