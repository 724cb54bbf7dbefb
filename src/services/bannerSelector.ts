import { randomInt } from "crypto";
import { Banner, MAX_BANNER_WEIGHT } from "../models/Banner";

/** Returns an integer drawn uniformly from [0, maxExclusive). */
export type RandomSource = (maxExclusive: number) => number;

export const cryptoRandom: RandomSource = (maxExclusive) => randomInt(maxExclusive);

// Out-of-range weights on hand-built candidates count as the ceiling
const selectionWeight = (banner: Banner) => Math.min(Math.max(0, banner.weight), MAX_BANNER_WEIGHT);

export class BannerSelector {
  constructor(private readonly random: RandomSource = cryptoRandom) {}

  /**
   * Weighted random pick: each candidate wins with probability weight / totalWeight.
   * Candidates are walked in the order given.
   */
  pick(candidates: readonly Banner[]): Banner | undefined {
    if (candidates.length === 0) return undefined;

    const totalWeight = candidates.reduce((sum, b) => sum + selectionWeight(b), 0);
    if (totalWeight <= 0) return candidates[0];

    let r = this.random(totalWeight);
    for (const banner of candidates) {
      const weight = selectionWeight(banner);
      if (r < weight) return banner;
      r -= weight;
    }

    // only reachable if the random source breaks its contract
    return candidates[0];
  }
}
