import cors from "cors";
import express from "express";
import { z } from "zod";
import type { StartupDataService } from "./services/startup-data.js";
import type { StartupSearchService } from "./services/startup-search.js";
import { collectMetadata } from "./services/crawl-stats.js";
import { searchDirectory, startupsByDomain, startupsByTag } from "./services/need-matcher.js";

export interface AppServices {
  data: Pick<StartupDataService, "getStartups" | "getStartup" | "getCrawlStats" | "forceRefresh" | "clearCache" | "upsertCurated">;
  search: Pick<StartupSearchService, "search" | "combine" | "recommend">;
  corsOrigin?: string[];
}

type AsyncHandler = (req: express.Request, res: express.Response, next: express.NextFunction) => Promise<void>;
function asyncHandler(fn: AsyncHandler): express.RequestHandler {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
}

const needSchema = z.string().trim().min(1).max(2000);
const topKSchema = z.coerce.number().int().min(1).max(50).optional();

const filtersSchema = z.object({
  tags: z.array(z.string().trim().min(1)).optional(),
  domain: z.string().trim().min(1).optional(),
  location: z.string().trim().min(1).optional()
});

const listingQuerySchema = z.object({
  q: z.string().trim().optional(),
  domain: z.string().trim().min(1).optional(),
  tag: z.string().trim().min(1).optional()
});

const searchSchema = z.object({
  need: needSchema,
  topK: topKSchema,
  filters: filtersSchema.optional(),
  mode: z.enum(["keyword", "semantic"]).default("keyword")
});

const combineSchema = z.object({
  need: needSchema,
  topK: topKSchema,
  filters: filtersSchema.optional()
});

const recommendSchema = z.object({
  need: needSchema,
  topK: topKSchema
});

const curatedStartupSchema = z.object({
  id: z.string().trim().min(1).optional(),
  name: z.string().trim().min(1),
  description: z.string().optional(),
  tags: z.union([z.array(z.string()), z.string()]).optional(),
  domain: z.string().optional(),
  location: z.string().optional(),
  url: z.string().optional(),
  contact: z.string().optional(),
  email: z.string().optional(),
  phone: z.string().optional(),
  ceo: z.string().optional(),
  yearFounded: z.string().optional(),
  employeeCount: z.string().optional(),
  logoUrl: z.string().optional()
});

export function createApp(services: AppServices): express.Express {
  const { data, search } = services;
  const app = express();

  app.use(cors({ origin: services.corsOrigin ?? true }));
  app.use(express.json({ limit: "1mb" }));

  app.get("/api/health", (_req, res) => {
    res.json({ ok: true, service: "startup-matcher" });
  });

  app.get(
    "/api/startups",
    asyncHandler(async (req, res) => {
      const parsed = listingQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        res.status(400).json({ message: parsed.error.flatten() });
        return;
      }

      let startups = await data.getStartups();
      const { q, domain, tag } = parsed.data;
      if (q) startups = searchDirectory(q, startups);
      if (domain) startups = startupsByDomain(startups, domain);
      if (tag) startups = startupsByTag(startups, tag);
      res.json(startups);
    })
  );

  app.get(
    "/api/startups/metadata",
    asyncHandler(async (_req, res) => {
      res.json(collectMetadata(await data.getStartups()));
    })
  );

  app.get(
    "/api/startups/:id",
    asyncHandler(async (req, res) => {
      const startup = await data.getStartup(req.params.id);
      if (!startup) {
        res.status(404).json({ message: "Startup not found" });
        return;
      }
      res.json(startup);
    })
  );

  app.post(
    "/api/search",
    asyncHandler(async (req, res) => {
      const parsed = searchSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        res.status(400).json({ message: parsed.error.flatten() });
        return;
      }
      res.json(await search.search(parsed.data));
    })
  );

  app.post(
    "/api/combine",
    asyncHandler(async (req, res) => {
      const parsed = combineSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        res.status(400).json({ message: parsed.error.flatten() });
        return;
      }
      res.json(await search.combine(parsed.data));
    })
  );

  app.post(
    "/api/recommend",
    asyncHandler(async (req, res) => {
      const parsed = recommendSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        res.status(400).json({ message: parsed.error.flatten() });
        return;
      }
      res.json(await search.recommend(parsed.data));
    })
  );

  app.get(
    "/api/admin/crawl-stats",
    asyncHandler(async (_req, res) => {
      res.json(await data.getCrawlStats());
    })
  );

  app.post(
    "/api/admin/refresh",
    asyncHandler(async (_req, res) => {
      await data.forceRefresh();
      res.json(await data.getCrawlStats());
    })
  );

  app.delete(
    "/api/admin/cache",
    asyncHandler(async (_req, res) => {
      await data.clearCache();
      res.status(204).end();
    })
  );

  app.put(
    "/api/admin/startups",
    asyncHandler(async (req, res) => {
      const parsed = curatedStartupSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        res.status(400).json({ message: parsed.error.flatten() });
        return;
      }
      res.json(await data.upsertCurated(parsed.data));
    })
  );

  app.use((error: Error & { status?: number }, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    console.error("[api] Unhandled error:", error.message);
    res.status(error.status ?? 500).json({ message: error.message || "Internal server error" });
  });

  return app;
}
