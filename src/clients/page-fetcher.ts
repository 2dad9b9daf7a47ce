/**
 * Plain HTTP page fetcher for website validation and excerpts
 */

import type { PageFetcher } from './types';
import { logger } from '../lib/logger';
import { errorMessage } from '../lib/errors';

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export class HttpPageFetcher implements PageFetcher {
  constructor(private readonly userAgent: string = DEFAULT_USER_AGENT) {}

  async fetchText(url: string, timeoutMs: number): Promise<string | null> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await fetch(url, {
        signal: controller.signal,
        headers: {
          'User-Agent': this.userAgent,
          'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
          'Accept-Language': 'en-US,en;q=0.5',
        },
      });

      if (response.status !== 200) {
        logger.debug(`Page fetch returned HTTP ${response.status}`, { url });
        return null;
      }

      return await response.text();
    } catch (error) {
      logger.debug('Page fetch failed', { url, error: errorMessage(error) });
      return null;
    } finally {
      clearTimeout(timeout);
    }
  }
}
