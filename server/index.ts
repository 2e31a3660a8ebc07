// Load env: prefer .env.local in dev, then .env (production defaults)
import { config } from "dotenv";
config({ path: ".env.local", override: true });
config();

import http from "http";
import express, { type Request, type Response, type NextFunction } from "express";
import cors from "cors";
import helmet from "helmet";
import compression from "compression";
import rateLimit from "express-rate-limit";
import morgan from "morgan";
import { getEnvInt, getEnvVar } from "../src/lib/env.js";
import { createLogger } from "../src/lib/utils/logger.js";
import { errorMessage } from "../src/lib/openPrep/errors.js";
import { createOpenPrepRouter } from "./routes/openPrep.js";

const log = createLogger("Server");
const app = express();

// ===== Security & perf =====
const WEB_ORIGIN = getEnvVar("WEB_ORIGIN") ?? "*";
app.use(helmet());
app.use(compression());
app.use(
  cors({
    origin: WEB_ORIGIN === "*" ? "*" : [WEB_ORIGIN],
    credentials: false,
  })
);
app.use(express.json({ limit: "1mb" }));

app.set("trust proxy", 1);
app.use(morgan("tiny"));

// Rate limit API paths
app.use("/api", rateLimit({ windowMs: 60_000, max: 600 }));

// ===== API routes =====
app.use(
  "/api/open-prep",
  createOpenPrepRouter({ outputDir: getEnvVar("OPEN_PREP_OUTPUT_DIR") ?? "./artifacts/open_prep" })
);

// ===== Health Check Endpoint =====
app.get("/api/health", (_req: Request, res: Response) => {
  res.json({
    status: "ok",
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
  });
});

// ===== Errors =====
app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
  log.error("Unhandled request error", { error: errorMessage(err) });
  res.status(500).json({ success: false, error: "Internal server error" });
});

const PORT = getEnvInt("PORT", 3000);
const server = http.createServer(app);

server.listen(PORT, () => {
  log.info(`Open-prep API listening on :${PORT}`);
});

process.on("SIGTERM", () => {
  log.info("Shutting down...");
  server.close(() => process.exit(0));
});
