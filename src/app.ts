import express, { type NextFunction, type Request, type Response } from "express";
import cors from "cors";
import multer from "multer";
import { pinoHttp } from "pino-http";
import { logger } from "./logger.js";
import { requireAuth, type AuthVerifier } from "./middleware/auth.js";
import type { JobStore } from "./repository/jobs.js";
import { createAiRouter } from "./routes/ai.js";
import { sendError } from "./routes/respond.js";
import { createUploadRouter } from "./routes/uploads.js";
import { createWebhookRouter } from "./routes/webhooks.js";
import type { FaceSwapService } from "./services/faceSwap.js";
import type { ImageStore } from "./services/imageStore.js";
import type { TryOnService } from "./services/tryOn.js";
import type { WebhookProcessor } from "./services/webhookProcessor.js";

export interface AppDeps {
  authVerifier: AuthVerifier;
  jobs: JobStore;
  faceSwap: FaceSwapService;
  tryOn: TryOnService;
  webhooks: WebhookProcessor;
  images: ImageStore;
  webhookSigningSecret: string;
}

export function createApp(deps: AppDeps) {
  const app = express();
  const auth = requireAuth(deps.authVerifier);

  app.use(cors());
  app.use(pinoHttp({ logger }));

  // Before express.json(): the webhook route reads the raw body
  app.use(
    "/api/webhooks",
    createWebhookRouter({ processor: deps.webhooks, signingSecret: deps.webhookSigningSecret })
  );

  app.use(express.json({ limit: "1mb" }));

  app.get("/api/health", (_req, res) => {
    res.json({ ok: true, timestamp: new Date().toISOString() });
  });

  app.use("/api/ai", createAiRouter({ auth, faceSwap: deps.faceSwap, tryOn: deps.tryOn, jobs: deps.jobs }));
  app.use("/api/uploads", createUploadRouter({ auth, images: deps.images }));

  // 404 handler
  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: "Not Found", code: "NOT_FOUND" });
  });

  // Error handler for anything thrown outside a route's own try/catch (body parsing, uploads)
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof multer.MulterError) {
      res.status(400).json({ error: err.message, code: "VALIDATION_ERROR" });
      return;
    }
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: "Malformed JSON body", code: "VALIDATION_ERROR" });
      return;
    }
    sendError(res, err, "unhandled request error");
  });

  return app;
}
