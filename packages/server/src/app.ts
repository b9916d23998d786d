import express from "express";
import cors from "cors";
import { healthController } from "./controllers/health.controller.js";
import { providerController } from "./controllers/provider.controller.js";
import { reportController } from "./controllers/report.controller.js";
import { errorHandler } from "./middleware/error-handler.js";
import { ReportService } from "./services/report.service.js";

export function createApp(service: ReportService = ReportService.fromEnvironment()): express.Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: "5mb" }));

  // Routes
  app.use("/health", healthController(service));
  app.use("/api/providers", providerController(service));
  app.use("/api/reports", reportController(service));

  // Error handler (must be after routes)
  app.use(errorHandler);

  return app;
}

/** Lines printed once the server is listening */
export function startupBanner(baseUrl: string, service: ReportService): string[] {
  const lines = [
    `Route intelligence API server running at ${baseUrl}`,
    `  POST ${baseUrl}/api/reports`,
    `  GET  ${baseUrl}/api/providers`,
    `  GET  ${baseUrl}/health`,
  ];
  for (const p of service.describeProviders()) {
    const state = p.eligible ? "enabled" : `disabled (needs ${p.primaryCredential ?? "nothing"})`;
    lines.push(`[report] ${p.id}: ${state}`);
  }
  return lines;
}
