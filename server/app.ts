import express from "express";
import { describeError } from "../ingest/errors";
import type { IngestOrchestrator } from "../ingest/pipeline/orchestrator";
import { PIPELINE_KINDS, type PipelineKind } from "../ingest/types";

const CONTENT_TYPES: Record<string, string> = {
  csv: "text/csv; charset=utf-8",
  json: "application/json"
};

function isPipelineKind(value: string): value is PipelineKind {
  return PIPELINE_KINDS.some((kind) => kind === value);
}

function contentTypeFor(key: string): string {
  const ext = key.slice(key.lastIndexOf(".") + 1).toLowerCase();
  return CONTENT_TYPES[ext] ?? "application/octet-stream";
}

const ARTIFACT_ROUTE = "/artifacts/";

function artifactKey(requestPath: string): string | null {
  try {
    return decodeURIComponent(requestPath.slice(ARTIFACT_ROUTE.length));
  } catch {
    return null;
  }
}

export function createApp(orchestrator: IngestOrchestrator) {
  const app = express();

  app.get("/healthz", (_req, res) => {
    res.json({ ok: true, reports: orchestrator.reports() });
  });

  app.post("/runs/:pipeline", async (req, res) => {
    const { pipeline } = req.params;
    if (!isPipelineKind(pipeline)) {
      res.status(404).json({ error: `Unknown pipeline: ${pipeline}` });
      return;
    }
    const report = await orchestrator.run(pipeline);
    res.json(report);
  });

  app.get("/artifacts", async (req, res) => {
    const prefix = typeof req.query.prefix === "string" ? req.query.prefix : "";
    try {
      const keys = await orchestrator.resolveStorage().list(prefix);
      res.json({ container: orchestrator.resolveStorage().container, keys });
    } catch (error) {
      console.error("[artifacts] list failed", { prefix, error: describeError(error) });
      res.status(502).json({ error: "Failed to list artifacts" });
    }
  });

  app.head("/artifacts/*", async (req, res) => {
    const key = artifactKey(req.path);
    if (!key) {
      res.status(400).end();
      return;
    }
    try {
      const found = await orchestrator.resolveStorage().exists(key);
      res.status(found ? 200 : 404).end();
    } catch (error) {
      console.error("[artifacts] exists failed", { key, error: describeError(error) });
      res.status(502).end();
    }
  });

  app.get("/artifacts/*", async (req, res) => {
    const key = artifactKey(req.path);
    if (!key) {
      res.status(400).json({ error: "Invalid artifact key" });
      return;
    }
    try {
      const data = await orchestrator.resolveStorage().get(key);
      if (!data) {
        res.status(404).json({ error: "Not found", key });
        return;
      }
      res.type(contentTypeFor(key)).send(Buffer.from(data));
    } catch (error) {
      console.error("[artifacts] read failed", { key, error: describeError(error) });
      res.status(502).json({ error: "Failed to read artifact" });
    }
  });

  return app;
}
