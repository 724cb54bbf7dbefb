import fs from "fs";
import path from "path";
import { z } from "zod";
import { BannerSeed, MAX_BANNER_WEIGHT } from "../models/Banner";

const seedEntrySchema = z.object({
  id: z.string().trim().min(1),
  image_url: z.string().trim().min(1),
  click_url: z.string().trim().min(1),
  title: z.string().optional(),
  weight: z.number().max(MAX_BANNER_WEIGHT).nullish(),
  active: z.boolean().optional(),
  is_local: z.boolean().optional(),
});

const seedFileSchema = z.array(seedEntrySchema);

export function parseBannerSeed(raw: unknown): BannerSeed[] {
  const parsed = seedFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid banner seed at ${issue.path.join(".") || "<root>"}: ${issue.message}`);
  }
  return parsed.data.map((entry) => ({
    id: entry.id,
    imageUrl: entry.image_url,
    clickUrl: entry.click_url,
    title: entry.title,
    weight: entry.weight,
    active: entry.active,
    isLocal: entry.is_local,
  }));
}

/**
 * Reads the initial catalog. Relative paths resolve from the working directory;
 * an empty path means no seed.
 */
export function loadBannerSeed(filePath: string, cwd: string = process.cwd()): BannerSeed[] {
  if (!filePath) return [];
  const fullPath = path.resolve(cwd, filePath);
  const text = fs.readFileSync(fullPath, "utf8");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw new Error(`Banner seed ${fullPath} is not valid JSON`, { cause: e });
  }
  return parseBannerSeed(raw);
}
