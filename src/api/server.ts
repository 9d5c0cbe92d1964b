import "dotenv/config";
import path from "path";
import { fileURLToPath } from "url";
import express from "express";
import type { Express, Response } from "express";
import { z } from "zod";
import { createAnthropicExtractor } from "../generation/llm_client.js";
import { AUTO, ManualEntrySchema } from "../manual/manual_entry.js";
import { ReportPipeline, requireRecord } from "../pipeline/report_pipeline.js";
import { serializeRecord } from "../record/validator.js";
import { SessionRegistry } from "../session/report_session.js";
import { PreconditionError, errorMessage } from "../shared/errors.js";
import { loadRunConfig, extractorEnabled } from "../shared/run_config.js";
import { logStep } from "../shared/log.js";
import { isExportFormat } from "../exports/exporter.js";
import { LOCATIONS, PRIMARY_ISSUES, ROOF_SYSTEMS, SEVERITIES, URGENCIES } from "../shared/types.js";
import type { ReportSession } from "../session/report_session.js";

const NormalizeBodySchema = z.object({ notes: z.string() });
const ExportReportSchema = z.enum(["internal", "customer", "field"]).default("internal");

export interface AppDeps {
  pipeline: ReportPipeline;
  sessions?: SessionRegistry;
}

function zodMessage(err: z.ZodError): string {
  return err.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`).join("; ");
}

/** Sends the 404 itself when the session is unknown. */
function findSession(sessions: SessionRegistry, id: string, res: Response): ReportSession | null {
  const session = sessions.get(id);
  if (!session) {
    res.status(404).json({ error: "Session not found" });
    return null;
  }
  return session;
}

function failure(res: Response, err: unknown): void {
  if (err instanceof PreconditionError) {
    res.status(404).json({ error: err.message });
    return;
  }
  res.status(500).json({ error: errorMessage(err) });
}

export function createApp(deps: AppDeps): Express {
  const { pipeline } = deps;
  const sessions = deps.sessions ?? new SessionRegistry();
  const app = express();
  app.use(express.json({ limit: "1mb" }));

  // ── GET /v1/vocabulary ────────────────────────────────────────────
  app.get("/v1/vocabulary", (_req, res) => {
    res.json({
      roofSystems: ROOF_SYSTEMS,
      primaryIssues: PRIMARY_ISSUES,
      locations: LOCATIONS,
      severities: [AUTO, ...SEVERITIES],
      urgencies: [AUTO, ...URGENCIES],
    });
  });

  // ── POST /v1/sessions ─────────────────────────────────────────────
  app.post("/v1/sessions", (_req, res) => {
    const session = sessions.create();
    res.status(201).json({ sessionId: session.id, extractorAvailable: pipeline.extractorAvailable });
  });

  // ── POST /v1/sessions/:id/normalize ───────────────────────────────
  app.post("/v1/sessions/:id/normalize", async (req, res) => {
    try {
      const session = findSession(sessions, req.params.id, res);
      if (!session) return;

      const body = NormalizeBodySchema.safeParse(req.body);
      if (!body.success) {
        res.status(400).json({ error: zodMessage(body.error) });
        return;
      }

      const outcome = await pipeline.normalize(session, body.data.notes);
      if (outcome.status === "failure") {
        res.status(422).json({ kind: outcome.kind, message: outcome.message, rawPayload: outcome.rawPayload });
        return;
      }
      res.json({
        record: outcome.record,
        customerDerived: outcome.customerDerived,
        warnings: outcome.warnings,
        rawPayload: outcome.rawPayload,
      });
    } catch (err) {
      failure(res, err);
    }
  });

  // ── POST /v1/sessions/:id/manual ──────────────────────────────────
  app.post("/v1/sessions/:id/manual", (req, res) => {
    try {
      const session = findSession(sessions, req.params.id, res);
      if (!session) return;

      const body = ManualEntrySchema.safeParse(req.body);
      if (!body.success) {
        res.status(400).json({ error: zodMessage(body.error) });
        return;
      }
      res.json({ record: pipeline.enterManual(session, body.data) });
    } catch (err) {
      failure(res, err);
    }
  });

  // ── GET /v1/sessions/:id/record ───────────────────────────────────
  app.get("/v1/sessions/:id/record", (req, res) => {
    try {
      const session = findSession(sessions, req.params.id, res);
      if (!session) return;
      res.type("application/json").send(serializeRecord(requireRecord(session)));
    } catch (err) {
      failure(res, err);
    }
  });

  // ── GET /v1/sessions/:id/report ───────────────────────────────────
  app.get("/v1/sessions/:id/report", (req, res) => {
    try {
      const session = findSession(sessions, req.params.id, res);
      if (!session) return;
      res.json(pipeline.render(session));
    } catch (err) {
      failure(res, err);
    }
  });

  // ── GET /v1/sessions/:id/export/:format ───────────────────────────
  app.get("/v1/sessions/:id/export/:format", async (req, res) => {
    try {
      const session = findSession(sessions, req.params.id, res);
      if (!session) return;

      const format = req.params.format;
      if (!isExportFormat(format)) {
        res.status(400).json({ error: `Unknown export format: ${format}` });
        return;
      }
      const kind = ExportReportSchema.safeParse(req.query.report);
      if (!kind.success) {
        res.status(400).json({ error: "report must be internal, customer or field" });
        return;
      }

      const result = await pipeline.exportOne(session, kind.data, format);
      const file = result.files[0];
      if (!file) {
        res.status(502).json({ error: "Export failed", warnings: result.warnings });
        return;
      }
      res.setHeader("Content-Type", file.contentType);
      res.setHeader("Content-Disposition", `attachment; filename="${file.filename}"`);
      res.send(file.content);
    } catch (err) {
      failure(res, err);
    }
  });

  // ── GET /v1/sessions/:id/bundle ───────────────────────────────────
  app.get("/v1/sessions/:id/bundle", async (req, res) => {
    try {
      const session = findSession(sessions, req.params.id, res);
      if (!session) return;

      const bundle = await pipeline.bundle(session);
      res.setHeader("Content-Type", "application/zip");
      res.setHeader("Content-Disposition", `attachment; filename="roof-report-${session.id}.zip"`);
      if (bundle.warnings.length > 0) res.setHeader("X-Export-Warnings", String(bundle.warnings.length));
      res.send(bundle.zip);
    } catch (err) {
      failure(res, err);
    }
  });

  // ── DELETE /v1/sessions/:id/record ────────────────────────────────
  app.delete("/v1/sessions/:id/record", (req, res) => {
    const session = findSession(sessions, req.params.id, res);
    if (!session) return;
    session.clear();
    res.status(204).end();
  });

  // ── DELETE /v1/sessions/:id ───────────────────────────────────────
  app.delete("/v1/sessions/:id", (req, res) => {
    if (!sessions.delete(req.params.id)) {
      res.status(404).json({ error: "Session not found" });
      return;
    }
    res.status(204).end();
  });

  return app;
}

// ── Start server ────────────────────────────────────────────────
export function startServer() {
  const config = loadRunConfig();
  const extractor = extractorEnabled(config) ? createAnthropicExtractor(config) : null;
  const app = createApp({
    pipeline: new ReportPipeline({ extractor }),
    sessions: new SessionRegistry({ idleTtlMs: config.sessionTtlMinutes * 60_000 }),
  });

  return app.listen(config.port, () => {
    logStep("API", `Roof notes API running on port ${config.port} (mode: ${config.mode})`);
  });
}

// Start if run directly
if (process.argv[1] && path.resolve(process.argv[1]) === path.resolve(fileURLToPath(import.meta.url))) {
  startServer();
}
