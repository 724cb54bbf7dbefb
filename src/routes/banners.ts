import { Router } from "express";
import { z } from "zod";
import { requireAdmin } from "../middleware/auth";
import { MAX_BANNER_WEIGHT, toBannerJson } from "../models/Banner";
import { toAnalyticsRow } from "../services/analytics";
import { BannerSelector } from "../services/bannerSelector";
import { BannerStore } from "../services/bannerStore";
import { NotFoundError, ValidationError, toAppError } from "../utils/errors";
import { componentLogger } from "../utils/logger";

const log = componentLogger("banners");

const requiredText = (field: string) =>
  z
    .string({ required_error: `${field} is required`, invalid_type_error: `${field} must be a string` })
    .trim()
    .min(1, `${field} is required`);

const optionalFields = {
  title: z.string({ invalid_type_error: "title must be a string" }).optional(),
  weight: z
    .number({ invalid_type_error: "weight must be a number" })
    .max(MAX_BANNER_WEIGHT, `weight must be at most ${MAX_BANNER_WEIGHT}`)
    .nullish(),
  is_local: z.boolean({ invalid_type_error: "is_local must be a boolean" }).optional(),
};

const eventSchema = z.object({
  banner_id: z
    .string({ required_error: "banner_id required", invalid_type_error: "banner_id required" })
    .trim()
    .min(1, "banner_id required"),
});

const createSchema = z.object({
  image_url: requiredText("image_url"),
  click_url: requiredText("click_url"),
  ...optionalFields,
});

// unknown keys, `id` included, are stripped
const updateSchema = z.object({
  image_url: requiredText("image_url").optional(),
  click_url: requiredText("click_url").optional(),
  active: z.boolean({ invalid_type_error: "active must be a boolean" }).optional(),
  ...optionalFields,
});

function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) throw new ValidationError(parsed.error.issues[0].message);
  return parsed.data;
}

export type BannerRouterOptions = {
  store: BannerStore;
  selector: BannerSelector;
  adminJwtSecret?: string;
};

export function createBannerRouter({ store, selector, adminJwtSecret }: BannerRouterOptions): Router {
  const router = Router();
  const admin = requireAdmin(adminJwtSecret);

  // Public: active banners in catalog order
  router.get("/", (_req, res, next) => {
    try {
      res.json(store.listActive().map(toBannerJson));
    } catch (e) {
      next(toAppError(e, "Failed to fetch banners"));
    }
  });

  // Public: one weighted-random pick from the active set
  router.get("/random", (_req, res, next) => {
    try {
      const banner = selector.pick(store.listActive());
      res.json({ banner: banner ? toBannerJson(banner) : null });
    } catch (e) {
      next(toAppError(e, "Failed to pick banner"));
    }
  });

  router.post("/impression", (req, res, next) => {
    try {
      const { banner_id } = parseBody(eventSchema, req.body);
      const impressions = store.recordImpression(banner_id);
      log.debug("Impression recorded", { bannerId: banner_id, impressions });
      res.json({ success: true, banner_id, impressions });
    } catch (e) {
      next(toAppError(e, "Failed to record impression"));
    }
  });

  router.post("/click", (req, res, next) => {
    try {
      const { banner_id } = parseBody(eventSchema, req.body);
      const clicks = store.recordClick(banner_id);
      log.debug("Click recorded", { bannerId: banner_id, clicks });
      res.json({ success: true, banner_id, clicks });
    } catch (e) {
      next(toAppError(e, "Failed to record click"));
    }
  });

  router.get("/analytics", admin, (_req, res, next) => {
    try {
      res.json(store.analyticsSnapshot());
    } catch (e) {
      next(toAppError(e, "Failed to fetch analytics"));
    }
  });

  router.get("/:id/analytics", admin, (req, res, next) => {
    try {
      const banner = store.get(req.params.id);
      if (!banner) throw new NotFoundError();
      res.json(toAnalyticsRow(banner, store.countersFor(banner.id)));
    } catch (e) {
      next(toAppError(e, "Failed to fetch analytics"));
    }
  });

  router.post("/", admin, (req, res, next) => {
    try {
      const body = parseBody(createSchema, req.body);
      const banner = store.create({
        imageUrl: body.image_url,
        clickUrl: body.click_url,
        title: body.title,
        weight: body.weight,
        isLocal: body.is_local,
      });
      log.info("Banner created", { bannerId: banner.id, adminId: res.locals.adminId });
      res.json({ success: true, banner: toBannerJson(banner) });
    } catch (e) {
      next(toAppError(e, "Failed to create banner"));
    }
  });

  router.patch("/:id", admin, (req, res, next) => {
    try {
      const { id } = req.params;
      // unknown id answers 404 before the body is looked at
      if (!store.get(id)) throw new NotFoundError();
      const body = parseBody(updateSchema, req.body);
      const banner = store.update(id, {
        imageUrl: body.image_url,
        clickUrl: body.click_url,
        title: body.title,
        weight: body.weight,
        active: body.active,
        isLocal: body.is_local,
      });
      log.info("Banner updated", { bannerId: id, adminId: res.locals.adminId });
      res.json({ success: true, banner: toBannerJson(banner) });
    } catch (e) {
      next(toAppError(e, "Failed to update banner"));
    }
  });

  // Soft delete: the banner stays in analytics
  router.delete("/:id", admin, (req, res, next) => {
    try {
      const banner = store.deactivate(req.params.id);
      log.info("Banner deactivated", { bannerId: banner.id, adminId: res.locals.adminId });
      res.json({ success: true, banner: toBannerJson(banner) });
    } catch (e) {
      next(toAppError(e, "Failed to delete banner"));
    }
  });

  return router;
}
