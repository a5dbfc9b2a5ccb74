/**
 * HTTP access for the dependency resolver: one reachability probe and the
 * runtime setup-script download.
 */
import { writeFile } from '../../utils/file-system.js';
import { NetworkUnavailableError } from '../../utils/errors.js';
import type { Logger } from '../../utils/logger.js';

export const NODESOURCE_HOST = 'https://deb.nodesource.com';
export const NETWORK_TIMEOUT_MS = 5000;
export const DOWNLOAD_TIMEOUT_MS = 60000;

export interface HttpClient {
  /** Resolve if the URL answers at all, reject otherwise */
  probe(url: string, timeoutMs: number): Promise<void>;
  /** Save the response body of a successful GET to `destination` */
  download(url: string, destination: string, timeoutMs: number): Promise<void>;
}

/**
 * HttpClient backed by the global fetch.
 */
export class FetchHttpClient implements HttpClient {
  async probe(url: string, timeoutMs: number): Promise<void> {
    await fetch(url, { method: 'HEAD', signal: AbortSignal.timeout(timeoutMs) });
  }

  async download(url: string, destination: string, timeoutMs: number): Promise<void> {
    const response = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
    if (!response.ok) {
      throw new Error(`HTTP ${response.status} ${response.statusText} for ${url}`);
    }
    await writeFile(destination, await response.text());
  }
}

/**
 * Fail fast when the vendor host cannot be reached.
 */
export async function checkNetwork(http: HttpClient, log: Logger, url = NODESOURCE_HOST): Promise<void> {
  try {
    await http.probe(url, NETWORK_TIMEOUT_MS);
    log.info('Internet connection verified');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    log.error(`No internet connection: ${reason}`);
    throw new NetworkUnavailableError(`No internet connection. Please check your network: ${reason}`, { url });
  }
}

/**
 * URL of the vendor setup script for a Node.js major version.
 */
export function nodeSetupScriptUrl(major: number): string {
  return `${NODESOURCE_HOST}/setup_${major}.x`;
}
