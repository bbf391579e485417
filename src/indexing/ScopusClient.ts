import { DEFAULT_SCOPUS_TIMEOUT_MS, SCOPUS_SERIAL_TITLE_URL } from '../config/scopus.js';
import { errorMessage, IndexServiceError } from '../core/errors.js';
import { createValidator, formatErrors, tryParseJson } from '../utils/validators.js';

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

/**
 * Subset of the serial title response the verifier reads
 */
export interface SerialTitleResponse {
  'serial-metadata-response'?: {
    entry?: unknown[];
  };
}

const validateSerialTitleResponse = createValidator<SerialTitleResponse>({
  type: 'object',
  properties: {
    'serial-metadata-response': {
      type: 'object',
      properties: {
        entry: { type: 'array' },
      },
    },
  },
});

export interface ScopusClientOptions {
  apiUrl?: string;
  timeoutMs?: number;
  fetch?: FetchFn;
}

/**
 * Scopus Serial Title Client
 *
 * Looks a journal title up in the Elsevier serial title API.
 * Every failure surfaces as IndexServiceError.
 */
export class ScopusClient {
  private apiUrl: string;
  private timeoutMs: number;
  private fetchFn: FetchFn;

  constructor(options?: ScopusClientOptions) {
    this.apiUrl = options?.apiUrl ?? SCOPUS_SERIAL_TITLE_URL;
    this.timeoutMs = options?.timeoutMs ?? DEFAULT_SCOPUS_TIMEOUT_MS;
    this.fetchFn = options?.fetch ?? ((input, init) => fetch(input, init));
  }

  buildUrl(title: string): string {
    const url = new URL(this.apiUrl);
    url.searchParams.set('title', title);
    url.searchParams.set('view', 'STANDARD');
    return url.toString();
  }

  /**
   * @returns true when the response lists at least one matching serial
   * @throws IndexServiceError on an empty key, transport failure, non-2xx
   *   status or an unexpected body
   */
  async lookupSerialTitle(title: string, apiKey: string): Promise<boolean> {
    if (!apiKey.trim()) {
      throw new IndexServiceError('Scopus API key is empty; request not sent');
    }

    let status = 0;
    let bodyText = '';
    try {
      const response = await this.fetchFn(this.buildUrl(title), {
        method: 'GET',
        headers: {
          'X-ELS-APIKey': apiKey,
          accept: 'application/json',
        },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      status = response.status;
      bodyText = await response.text();
      if (!response.ok) {
        throw new IndexServiceError(`Scopus API returned HTTP ${status}`, { status });
      }
    } catch (error) {
      if (error instanceof IndexServiceError) {
        throw error;
      }
      throw new IndexServiceError(`Scopus request failed: ${errorMessage(error)}`, { cause: error });
    }

    const body = tryParseJson(bodyText);
    if (!validateSerialTitleResponse(body)) {
      throw new IndexServiceError(
        `Unexpected Scopus response body: ${formatErrors(validateSerialTitleResponse.errors)}`,
        { status }
      );
    }

    const entries = body['serial-metadata-response']?.entry ?? [];
    return entries.length > 0;
  }
}
