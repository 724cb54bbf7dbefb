import { AnalyticsCounters, Banner, BannerAnalyticsRow } from "../models/Banner";

/**
 * Click-through rate as a percentage string with two decimals, e.g. "33.33%".
 * No impressions yields "0%".
 */
export function ctr(impressions: number, clicks: number): string {
  if (impressions === 0) return "0%";
  return ((clicks / impressions) * 100).toFixed(2) + "%";
}

export function toAnalyticsRow(banner: Banner, counters: AnalyticsCounters): BannerAnalyticsRow {
  return {
    id: banner.id,
    title: banner.title,
    impressions: counters.impressions,
    clicks: counters.clicks,
    ctr: ctr(counters.impressions, counters.clicks),
    active: banner.active,
  };
}
