import { Router } from "express";
import type { HealthResponse } from "../models/responses.js";
import type { ReportService } from "../services/report.service.js";

/** GET /health: liveness plus which providers the server can run */
export function healthController(service: ReportService): Router {
  const router = Router();

  router.get("/", (_req, res) => {
    const body: HealthResponse = {
      status: "ok",
      uptime: process.uptime(),
      providers: service.describeProviders().map((p) => ({ id: p.id, eligible: p.eligible })),
    };
    res.json(body);
  });

  return router;
}
