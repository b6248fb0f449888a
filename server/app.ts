import express, { type NextFunction, type Request, type Response } from "express";
import type { Server } from "http";
import { HttpError } from "./errors";
import { log } from "./log";
import { registerRoutes, type AppServices } from "./routes";

function statusOf(err: unknown): number {
  if (err instanceof HttpError) return err.status;
  // body-parser attaches the HTTP status to its errors
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") {
    return err.status;
  }
  return 500;
}

export function createApp(services: AppServices): { app: express.Express; server: Server } {
  const app = express();

  app.use(express.json({ limit: "1mb" }));
  app.use(express.urlencoded({ extended: false }));

  app.use((req, res, next) => {
    const start = Date.now();
    const path = req.path;
    let capturedJsonResponse: unknown = undefined;

    const originalResJson = res.json.bind(res);
    res.json = (bodyJson) => {
      capturedJsonResponse = bodyJson;
      return originalResJson(bodyJson);
    };

    res.on("finish", () => {
      const duration = Date.now() - start;
      if (path.startsWith("/api")) {
        let logLine = `${req.method} ${path} ${res.statusCode} in ${duration}ms`;
        if (capturedJsonResponse !== undefined) {
          logLine += ` :: ${JSON.stringify(capturedJsonResponse)}`;
        }

        if (logLine.length > 80) {
          logLine = logLine.slice(0, 79) + "…";
        }

        log(logLine);
      }
    });

    next();
  });

  const server = registerRoutes(app, services);

  app.use("/api", (_req, res) => {
    res.status(404).json({ error: "Not found" });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = statusOf(err);
    const message = err instanceof Error ? err.message : "Internal Server Error";
    if (status >= 500) {
      console.error("[HTTP] Unhandled error:", err);
    }
    res.status(status).json({ message });
  });

  return { app, server };
}
