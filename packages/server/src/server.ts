import { createApp, startupBanner } from "./app.js";
import { ReportService } from "./services/report.service.js";

const PORT = parseInt(process.env["PORT"] ?? "3000", 10);

const service = ReportService.fromEnvironment();
const app = createApp(service);

app.listen(PORT, () => {
  console.log("");
  for (const line of startupBanner(`http://localhost:${PORT}`, service)) {
    console.log(line);
  }
});
