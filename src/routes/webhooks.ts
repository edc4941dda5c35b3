import express, { Router } from "express";
import { logger } from "../logger.js";
import type { WebhookProcessor } from "../services/webhookProcessor.js";
import { verifyWebhookSignature } from "../services/webhookSignature.js";

export interface WebhookRouterDeps {
  processor: WebhookProcessor;
  /** Empty disables signature checks. */
  signingSecret: string;
}

/**
 * Provider callbacks. Mounted ahead of the JSON body parser: the raw body is needed to check the
 * signature, so it is parsed here.
 */
export function createWebhookRouter({ processor, signingSecret }: WebhookRouterDeps): Router {
  const router = Router();

  router.all("/replicate", express.raw({ type: "*/*", limit: "1mb" }), async (req, res) => {
    if (req.method !== "POST") {
      res.status(405).send("Method Not Allowed");
      return;
    }

    const rawBody = Buffer.isBuffer(req.body) ? req.body.toString("utf8") : "";

    if (signingSecret) {
      const valid = verifyWebhookSignature(
        {
          id: req.header("webhook-id"),
          timestamp: req.header("webhook-timestamp"),
          signature: req.header("webhook-signature"),
          body: rawBody,
        },
        signingSecret
      );
      if (!valid) {
        logger.warn({ webhookId: req.header("webhook-id") }, "Webhook signature verification failed");
        res.status(401).json({ error: "Invalid webhook signature" });
        return;
      }
    }

    let payload: unknown;
    try {
      payload = JSON.parse(rawBody);
    } catch {
      logger.warn("Webhook body is not valid JSON");
      res.status(400).json({ error: "Bad Request: missing id or status." });
      return;
    }

    try {
      const ack = await processor.process(payload);
      res.status(ack.httpStatus).json(ack.body);
    } catch (err: unknown) {
      logger.error(err, "webhook job update failed");
      res.status(500).json({ error: "Failed to update job" });
    }
  });

  return router;
}
