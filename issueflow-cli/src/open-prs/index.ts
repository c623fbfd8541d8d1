import open from 'open';
import type { PRManager } from '../github/pulls.js';
import type { Logger } from '../utils/logger.js';

export const OPEN_DELAY_MS = 500;

export interface OpenPRsDeps {
  pulls: Pick<PRManager, 'listOpenPRs'>;
  log: Logger;
  openUrl?: (url: string) => Promise<unknown>;
  delayMs?: number;
}

export interface OpenPRsResult {
  urls: string[];
  opened: string[];
  failed: string[];
}

const wait = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Open every open PR in the default browser, one at a time. A URL that fails
 * to open is reported and skipped.
 */
export async function openAllPRs(deps: OpenPRsDeps): Promise<OpenPRsResult> {
  const { pulls, log } = deps;
  const openUrl = deps.openUrl ?? ((url: string) => open(url));
  const delayMs = deps.delayMs ?? OPEN_DELAY_MS;

  log.info('Fetching open pull requests...');
  const urls = (await pulls.listOpenPRs()).map((pr) => pr.htmlUrl);

  if (urls.length === 0) {
    log.print('No open pull requests found.');
    return { urls, opened: [], failed: [] };
  }

  log.print(`Found ${urls.length} open pull request(s):`);
  for (const url of urls) log.print(url);
  log.print();
  log.info('Opening all PRs in your browser...');

  const opened: string[] = [];
  const failed: string[] = [];
  for (const [index, url] of urls.entries()) {
    log.print(`Opening: ${url}`);
    try {
      await openUrl(url);
      opened.push(url);
    } catch (error) {
      failed.push(url);
      log.warn(`Failed to open: ${url}`, { error: error instanceof Error ? error.message : String(error) });
    }
    if (index < urls.length - 1) {
      await wait(delayMs);
    }
  }

  log.success('Done!');
  return { urls, opened, failed };
}
