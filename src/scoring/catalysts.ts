/**
 * Headline keyword catalysts
 */

import type { CatalystEvent, NewsItem } from '@/types/signals';

/**
 * Keywords (lowercase, in keyword order) found anywhere in any headline.
 * Substring match, so "launch" also hits "launches" and "relaunched".
 */
export function findCatalystKeywords(
  news: readonly NewsItem[],
  keywords: readonly string[]
): string[] {
  if (news.length === 0 || keywords.length === 0) return [];

  const headlines = news.map((item) => item.headline.toLowerCase());
  return keywords
    .map((keyword) => keyword.toLowerCase())
    .filter((keyword) => headlines.some((headline) => headline.includes(keyword)));
}

/**
 * Headlines carry no usable event date, so any match counts as a single
 * catalyst from today.
 */
export function catalystEventsFromMatches(matches: readonly string[]): CatalystEvent[] {
  if (matches.length === 0) return [];
  return [{ keyword: matches[0], daysAgo: 0 }];
}
