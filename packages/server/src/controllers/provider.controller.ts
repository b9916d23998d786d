import { Router } from "express";
import type { ProvidersResponse } from "../models/responses.js";
import type { ReportService } from "../services/report.service.js";

/** GET /api/providers: capability table with eligibility */
export function providerController(service: ReportService): Router {
  const router = Router();

  router.get("/", (_req, res) => {
    const body: ProvidersResponse = { providers: service.describeProviders() };
    res.json(body);
  });

  return router;
}
