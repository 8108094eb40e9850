import express, { NextFunction, Request, Response } from "express";
import cors from "cors";
import type { Logger } from "pino";
import pinoHttp from "pino-http";
import { randomUUID } from "crypto";
import {
  TrendUnavailableError,
  isAppError,
  toErrorBody,
} from "@viralscript/shared";
import { analyzeTopic, parseAnalyzeRequest } from "./analyzer";
import { ScriptAssembler, parseScriptRequest } from "./assembler";
import type { Catalog } from "./catalog";
import type { TrendCache, TrendSnapshot } from "./trendCache";
import pkg from "../package.json";

export type AppDeps = {
  catalog: Catalog;
  trends: TrendCache;
  logger: Logger;
  corsOrigin?: string;
};

function sendError(
  req: Request,
  res: Response,
  err: unknown,
  extra: Record<string, unknown> = {},
) {
  const status = isAppError(err) ? err.statusCode : 500;
  if (status >= 500) req.log.error({ err }, "request.failed");
  return res.status(status).json({ ...toErrorBody(err), ...extra });
}

function trendsBody(snapshot: TrendSnapshot) {
  return {
    success: true,
    trends: { ...snapshot.perSource, merged: snapshot.merged },
    location: snapshot.location,
    updated_at: snapshot.fetchedAt,
    stale: snapshot.stale,
  };
}

const EMPTY_TRENDS_BODY = {
  success: true,
  trends: { tiktok: [], x: [], google: [], merged: [] },
  updated_at: null,
  stale: false,
} as const;

function clientErrorStatus(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null || !("status" in err)) return undefined;
  const { status } = err;
  return typeof status === "number" && status >= 400 && status < 500 ? status : undefined;
}

function wantsRefresh(req: Request): boolean {
  const flag = String(req.query.refresh ?? "").toLowerCase();
  return flag === "1" || flag === "true";
}

export function createApp({ catalog, trends, logger, corsOrigin = "*" }: AppDeps) {
  const assembler = new ScriptAssembler(catalog);
  const app = express();
  app.use(cors({ origin: corsOrigin }));
  app.use(
    pinoHttp({
      logger,
      genReqId: () => randomUUID(),
      customLogLevel: (_req, res, err) => {
        if (res.statusCode >= 500 || err) return "error";
        if (res.statusCode >= 400) return "warn";
        return "info";
      },
    }),
  );
  app.use(express.json({ limit: "100kb" }));

  const api = express.Router();

  api.get("/health", (_req: Request, res: Response) =>
    res.json({ ok: true, status: "healthy", version: pkg.version }),
  );

  api.post("/generate", (req: Request, res: Response) => {
    const started = Date.now();
    try {
      const script = assembler.generate(parseScriptRequest(req.body));
      req.log.info(
        {
          niche: script.niche,
          hook_style: script.hook_style,
          length: script.length,
          hook_score: script.hook_score,
        },
        "script.generated",
      );
      return res.json({
        success: true,
        script,
        generation_time_ms: Date.now() - started,
      });
    } catch (err) {
      return sendError(req, res, err, { generation_time_ms: Date.now() - started });
    }
  });

  const sendTrends = async (req: Request, res: Response, forceRefresh: boolean) => {
    try {
      const snapshot = await trends.fetch(forceRefresh);
      return res.json(trendsBody(snapshot));
    } catch (err) {
      if (err instanceof TrendUnavailableError) {
        req.log.warn({ err }, "trends.unavailable");
        return res.json(EMPTY_TRENDS_BODY);
      }
      return sendError(req, res, err);
    }
  };

  api.get("/trends", (req: Request, res: Response) => sendTrends(req, res, false));
  api.get("/trends/live", (req: Request, res: Response) =>
    sendTrends(req, res, wantsRefresh(req)),
  );

  api.post("/analyze", async (req: Request, res: Response) => {
    try {
      const request = parseAnalyzeRequest(req.body);
      let merged: TrendSnapshot["merged"] = [];
      try {
        merged = (await trends.fetch(false)).merged;
      } catch (err) {
        if (!(err instanceof TrendUnavailableError)) throw err;
        req.log.warn({ err }, "trends.unavailable");
      }
      return res.json({ success: true, analysis: analyzeTopic(catalog, request, merged) });
    } catch (err) {
      return sendError(req, res, err);
    }
  });

  api.get("/hooks", (_req: Request, res: Response) =>
    res.json({
      success: true,
      styles: catalog.hookStyles().map((h) => ({
        id: h.id,
        label: h.label,
        efficacy: h.efficacy,
        template_example: h.templates[0],
      })),
    }),
  );

  api.get("/niches", (_req: Request, res: Response) =>
    res.json({
      success: true,
      niches: catalog.niches().map((n) => ({
        id: n.id,
        label: n.label,
        tone: n.tone,
        hashtags: n.hashtags,
        best_hook: catalog.bestHookFor(n.id).id,
        optimal_length: n.optimal_length,
      })),
    }),
  );

  api.get("/lengths", (_req: Request, res: Response) =>
    res.json({
      success: true,
      lengths: catalog.lengths().map((l) => ({
        id: l.id,
        label: l.label,
        total_seconds: l.total_seconds,
      })),
    }),
  );

  app.use("/api", api);

  app.use((_req: Request, res: Response) =>
    res.status(404).json({ success: false, error: "not_found" }),
  );

  // Malformed JSON bodies surface here from express.json()
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError) {
      return res.status(400).json({ success: false, error: "invalid_json" });
    }
    const status = clientErrorStatus(err);
    if (status) return res.status(status).json({ success: false, error: "bad_request" });
    return sendError(req, res, err);
  });

  return app;
}
