import { randomUUID } from "crypto";
import {
  AnalyticsCounters,
  Banner,
  BannerAnalyticsRow,
  BannerSeed,
  BannerUpdate,
  NewBanner,
  normalizeWeight,
  titleOrDefault,
} from "../models/Banner";
import { NotFoundError, ValidationError } from "../utils/errors";
import { toAnalyticsRow } from "./analytics";

export type BannerStoreOptions = {
  seed?: readonly BannerSeed[];
  generateId?: () => string;
};

const defaultGenerateId = () => `banner_${randomUUID()}`;

function requireText(value: string | undefined, field: string): string {
  const trimmed = value?.trim();
  if (!trimmed) throw new ValidationError(`${field} is required`);
  return trimmed;
}

/**
 * In-memory catalog of banners plus their impression/click counters.
 *
 * Every method is synchronous, so each one runs to completion on the event loop
 * before another request can touch the store. Banners are replaced, never
 * edited in place, and callers only ever receive copies.
 */
export class BannerStore {
  // Map keeps insertion order for listings
  private readonly banners = new Map<string, Banner>();
  private readonly counters = new Map<string, AnalyticsCounters>();
  private readonly generateId: () => string;

  constructor(options: BannerStoreOptions = {}) {
    this.generateId = options.generateId ?? defaultGenerateId;
    for (const seed of options.seed ?? []) {
      const id = requireText(seed.id, "id");
      if (this.banners.has(id)) throw new ValidationError(`Duplicate banner id: ${id}`);
      this.banners.set(id, { ...this.buildBanner(id, seed), active: seed.active ?? true });
    }
  }

  listActive(): Banner[] {
    const active: Banner[] = [];
    for (const banner of this.banners.values()) {
      if (banner.active) active.push({ ...banner });
    }
    return active;
  }

  get(id: string): Banner | undefined {
    const banner = this.banners.get(id);
    return banner ? { ...banner } : undefined;
  }

  create(fields: NewBanner): Banner {
    const id = this.nextId();
    const banner = this.buildBanner(id, fields);
    this.banners.set(id, banner);
    return { ...banner };
  }

  update(id: string, fields: BannerUpdate): Banner {
    const current = this.banners.get(id);
    if (!current) throw new NotFoundError();

    const next: Banner = { ...current };
    if (fields.imageUrl !== undefined) next.imageUrl = requireText(fields.imageUrl, "imageUrl");
    if (fields.clickUrl !== undefined) next.clickUrl = requireText(fields.clickUrl, "clickUrl");
    if (fields.title !== undefined) next.title = titleOrDefault(fields.title);
    if (fields.weight !== undefined) next.weight = normalizeWeight(fields.weight);
    if (fields.active !== undefined) next.active = fields.active;
    if (fields.isLocal !== undefined) next.isLocal = fields.isLocal;

    this.banners.set(id, next);
    return { ...next };
  }

  deactivate(id: string): Banner {
    const current = this.banners.get(id);
    if (!current) throw new NotFoundError();
    if (!current.active) return { ...current };

    const next = { ...current, active: false };
    this.banners.set(id, next);
    return { ...next };
  }

  recordImpression(id: string): number {
    return this.increment(id, "impressions");
  }

  recordClick(id: string): number {
    return this.increment(id, "clicks");
  }

  countersFor(id: string): AnalyticsCounters {
    const c = this.counters.get(id);
    return { impressions: c?.impressions ?? 0, clicks: c?.clicks ?? 0 };
  }

  /** One row per catalog banner, inactive ones included. */
  analyticsSnapshot(): BannerAnalyticsRow[] {
    return [...this.banners.values()].map((b) => toAnalyticsRow(b, this.countersFor(b.id)));
  }

  private buildBanner(id: string, fields: NewBanner): Banner {
    return {
      id,
      imageUrl: requireText(fields.imageUrl, "imageUrl"),
      clickUrl: requireText(fields.clickUrl, "clickUrl"),
      title: titleOrDefault(fields.title),
      weight: normalizeWeight(fields.weight),
      active: true,
      isLocal: fields.isLocal ?? false,
    };
  }

  private nextId(): string {
    let id = this.generateId();
    // a custom generator could repeat itself, or hit a seeded id
    for (let attempts = 1; this.banners.has(id); attempts++) {
      if (attempts >= 10) throw new Error("Could not generate a unique banner id");
      id = this.generateId();
    }
    return id;
  }

  private increment(id: string, field: keyof AnalyticsCounters): number {
    if (!id || !id.trim()) throw new ValidationError("banner_id required");
    const current = this.counters.get(id) ?? { impressions: 0, clicks: 0 };
    const next = { ...current, [field]: current[field] + 1 };
    this.counters.set(id, next);
    return next[field];
  }
}
