import { Router } from "express";
import type { ReportService } from "../services/report.service.js";

/** POST /api/reports: generate a report for a route */
export function reportController(service: ReportService): Router {
  const router = Router();

  router.post("/", async (req, res, next) => {
    // Cancel the run when the client goes away before the report is sent
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableEnded) controller.abort();
    });

    try {
      const result = await service.generate(req.body, controller.signal);
      res.json(result);
    } catch (err) {
      next(err);
    }
  });

  return router;
}
