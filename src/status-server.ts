import express from "express";
import { payloadToText, type ReportPayload } from "../lib/report-payload.js";

export type StatusSource = {
  lastMarker: () => string | null;
  nextWakeAt: () => Date | null;
  lastCycle: () => unknown;
  preview: () => Promise<ReportPayload>;
};

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/**
 * 상태 조회 / 미리보기 API
 * 미리보기는 웹훅으로 보내지 않고 마지막 마커도 바꾸지 않는다.
 */
export function createStatusApp(source: StatusSource): express.Express {
  const app = express();

  app.get("/healthz", (_req, res) => {
    res.json({ ok: true });
  });

  app.get("/api/status", (_req, res) => {
    res.setHeader("Cache-Control", "no-store");
    res.json({
      lastMarker: source.lastMarker(),
      nextWakeAt: source.nextWakeAt()?.toISOString() ?? null,
      lastCycle: source.lastCycle() ?? null,
    });
  });

  app.get("/api/preview", async (_req, res) => {
    try {
      res.json(await source.preview());
    } catch (e) {
      console.error(`[Status] Preview failed: ${errorMessage(e)}`);
      res.status(500).json({ error: errorMessage(e) });
    }
  });

  app.get("/api/preview.txt", async (_req, res) => {
    try {
      const payload = await source.preview();
      res.setHeader("content-type", "text/plain; charset=utf-8");
      res.send(payloadToText(payload));
    } catch (e) {
      console.error(`[Status] Preview failed: ${errorMessage(e)}`);
      res.status(500).send(errorMessage(e));
    }
  });

  return app;
}
