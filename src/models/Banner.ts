import { ValidationError } from "../utils/errors";

export const DEFAULT_BANNER_TITLE = "New Banner";

// keeps any catalog's total weight far below crypto.randomInt's 2^48 - 1 ceiling
export const MAX_BANNER_WEIGHT = 1_000_000;

export interface Banner {
  id: string;
  imageUrl: string;
  clickUrl: string;
  title: string;
  weight: number;
  active: boolean;
  // bundled app asset rather than a remote image; display hint only
  isLocal: boolean;
}

export type NewBanner = {
  imageUrl?: string;
  clickUrl?: string;
  title?: string;
  weight?: number | null;
  isLocal?: boolean;
};

// `id` is accepted but never applied
export type BannerUpdate = Partial<Omit<Banner, "weight">> & { weight?: number | null };

export type BannerSeed = NewBanner & { id: string; active?: boolean };

export interface AnalyticsCounters {
  impressions: number;
  clicks: number;
}

export interface BannerAnalyticsRow {
  id: string;
  title: string;
  impressions: number;
  clicks: number;
  ctr: string;
  active: boolean;
}

export type BannerJson = {
  id: string;
  image_url: string;
  click_url: string;
  title: string;
  weight: number;
  active: boolean;
  is_local: boolean;
};

/**
 * Any weight below 1 (or not a finite number) selects as 1; fractions are floored.
 * Weights above MAX_BANNER_WEIGHT are rejected.
 */
export function normalizeWeight(weight?: number | null): number {
  if (weight === undefined || weight === null || !Number.isFinite(weight) || weight < 1) return 1;
  if (weight > MAX_BANNER_WEIGHT) throw new ValidationError(`weight must be at most ${MAX_BANNER_WEIGHT}`);
  return Math.floor(weight);
}

export function titleOrDefault(title?: string): string {
  return title && title.trim() ? title : DEFAULT_BANNER_TITLE;
}

export function toBannerJson(banner: Banner): BannerJson {
  return {
    id: banner.id,
    image_url: banner.imageUrl,
    click_url: banner.clickUrl,
    title: banner.title,
    weight: banner.weight,
    active: banner.active,
    is_local: banner.isLocal,
  };
}
