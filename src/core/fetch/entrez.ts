// src/core/fetch/entrez.ts
import { EFETCH_DATABASE, getEfetchUrl } from '../config/constants.js';
import { AccFetchError, ErrorCode, describeError } from '../errors.js';

/** Anything that can return the raw FASTA text of one accession */
export interface SequenceSource {
  fetchFasta(accession: string): Promise<string>;
}

export function buildEfetchUrl(baseUrl: string, accession: string): string {
  const url = new URL(baseUrl);
  url.searchParams.set('db', EFETCH_DATABASE);
  url.searchParams.set('id', accession);
  url.searchParams.set('rettype', 'fasta');
  url.searchParams.set('retmode', 'text');
  return url.toString();
}

export class EntrezClient implements SequenceSource {
  constructor(private baseUrl: string = getEfetchUrl()) {}

  async fetchFasta(accession: string): Promise<string> {
    const requestUrl = buildEfetchUrl(this.baseUrl, accession);

    let response: Response;
    try {
      response = await fetch(requestUrl);
    } catch (error) {
      throw new AccFetchError(
        ErrorCode.NETWORK_ERROR,
        `Could not reach ${this.baseUrl}: ${describeError(error)}`,
        false,
        'Check your internet connection',
        { accession }
      );
    }

    if (!response.ok) {
      throw new AccFetchError(
        ErrorCode.NETWORK_ERROR,
        `HTTP ${response.status} while fetching ${accession}`,
        false,
        undefined,
        { accession, status: response.status }
      );
    }

    try {
      return await response.text();
    } catch (error) {
      throw new AccFetchError(
        ErrorCode.NETWORK_ERROR,
        `Connection lost while reading ${accession}: ${describeError(error)}`,
        false,
        undefined,
        { accession }
      );
    }
  }
}
