import { getEnv } from '../env.js';
import { FetchFailure, errorMessage } from '../errors.js';
import type { TradeType } from '../types.js';

const ARTICLE_LIST_PATH = '/complex/getComplexArticleList';
const PAGE_SIZE = 20;

// The mobile endpoint only answers requests that look like the mobile site.
const HEADERS: Record<string, string> = {
  'User-Agent':
    'Mozilla/5.0 (Linux; Android 10; SM-G981B) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/80.0.3987.162 Mobile Safari/537.36',
  Referer: 'https://m.land.naver.com/',
  Accept: 'application/json, text/javascript, */*; q=0.01',
  'X-Requested-With': 'XMLHttpRequest',
  'Accept-Language': 'ko-KR,ko;q=0.9,en-US;q=0.8,en;q=0.7'
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

interface ArticlePage {
  list: unknown[];
  more: boolean | undefined;
}

function readArticlePage(payload: unknown, page: number): ArticlePage {
  const result = isRecord(payload) ? payload.result : undefined;
  const list = isRecord(result) ? result.list : undefined;
  if (!isRecord(result) || !Array.isArray(list)) {
    throw new FetchFailure(`article list page ${page} has no result.list`);
  }
  const moreFlag = result.moreDataYn;
  return {
    list,
    more: moreFlag === 'Y' ? true : moreFlag === 'N' ? false : undefined
  };
}

async function landGet(query: Record<string, string | number>): Promise<unknown> {
  const env = getEnv();
  const url = new URL(ARTICLE_LIST_PATH, env.LISTING_API_BASE_URL);

  for (const [key, value] of Object.entries(query)) {
    url.searchParams.set(key, String(value));
  }

  let res: Response;
  try {
    res = await fetch(url, { method: 'GET', headers: HEADERS, signal: AbortSignal.timeout(env.FETCH_TIMEOUT_MS) });
  } catch (err) {
    throw new FetchFailure(`listing request failed: ${errorMessage(err)}`, { cause: err });
  }

  if (!res.ok) {
    const text = await res.text().catch(() => '');
    throw new FetchFailure(`listing request failed (${res.status}): ${text}`);
  }

  try {
    return (await res.json()) as unknown;
  } catch (err) {
    throw new FetchFailure(`listing response was not JSON: ${errorMessage(err)}`, { cause: err });
  }
}

/**
 * Pages through the article list of one complex, newest first. Any failed
 * page fails the whole fetch so a run never stores a partial snapshot.
 */
export async function fetchListings(complexId: string, tradeType: TradeType): Promise<unknown[]> {
  const env = getEnv();
  const articles: unknown[] = [];

  for (let page = 1; page <= env.LISTING_MAX_PAGES; page++) {
    const payload = await landGet({
      hscpNo: complexId,
      tradTpCd: tradeType,
      order: 'date_desc',
      showR0: 'N',
      page
    });

    const { list, more } = readArticlePage(payload, page);
    articles.push(...list);

    if (list.length === 0 || more === false || list.length < PAGE_SIZE) break;
    if (page < env.LISTING_MAX_PAGES && env.LISTING_PAGE_DELAY_MS > 0) {
      await sleep(env.LISTING_PAGE_DELAY_MS);
    }
  }

  return articles;
}
