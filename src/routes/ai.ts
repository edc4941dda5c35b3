import { Router, type RequestHandler } from "express";
import { z } from "zod";
import { NotFoundError, ValidationError } from "../errors.js";
import { currentUserId } from "../middleware/auth.js";
import type { JobStore } from "../repository/jobs.js";
import type { JobRecord } from "../types.js";
import type { FaceSwapService } from "../services/faceSwap.js";
import type { TryOnService } from "../services/tryOn.js";
import { sendError, validationMessage } from "./respond.js";

const faceSwapBody = z.object({
  listing_id: z.string().min(1),
  image_url: z.string().url(),
});

const tryOnBody = z.object({
  user_image_url: z.string().url(),
  garment_image_url: z.string().url(),
  garment_description: z.string().min(1),
  fcm_token: z.string().min(1),
});

export interface AiRouterDeps {
  auth: RequestHandler;
  faceSwap: FaceSwapService;
  tryOn: TryOnService;
  jobs: JobStore;
}

export function createAiRouter({ auth, faceSwap, tryOn, jobs }: AiRouterDeps): Router {
  const router = Router();

  // ============================================
  // Face swap on a listing photo (blocks until the model finishes)
  // ============================================
  router.post("/face-swap", auth, async (req, res) => {
    try {
      const userId = currentUserId(req);
      const body = faceSwapBody.safeParse(req.body);
      if (!body.success) {
        throw new ValidationError(validationMessage(body.error));
      }

      const result = await faceSwap.generate({
        userId,
        listingId: body.data.listing_id,
        imageUrl: body.data.image_url,
      });
      res.json(result);
    } catch (err: unknown) {
      sendError(res, err, "face swap failed");
    }
  });

  // ============================================
  // Virtual try-on (returns immediately, result arrives by webhook + push)
  // ============================================
  router.post("/try-on", auth, async (req, res) => {
    try {
      const userId = currentUserId(req);
      const body = tryOnBody.safeParse(req.body);
      if (!body.success) {
        throw new ValidationError(validationMessage(body.error));
      }

      const result = await tryOn.submit({
        userId,
        userImageUrl: body.data.user_image_url,
        garmentImageUrl: body.data.garment_image_url,
        garmentDescription: body.data.garment_description,
        notificationToken: body.data.fcm_token,
      });
      res.status(202).json(result);
    } catch (err: unknown) {
      sendError(res, err, "failed to submit try-on job");
    }
  });

  // ============================================
  // Job status for the owner
  // ============================================
  router.get("/jobs/:jobId", auth, async (req, res) => {
    try {
      const userId = currentUserId(req);
      const job = await jobs.getForUser(req.params.jobId, userId);
      if (!job) {
        throw new NotFoundError("Job not found");
      }
      res.json({ job: toPublicJob(job) });
    } catch (err: unknown) {
      sendError(res, err, "failed to query job");
    }
  });

  router.get("/jobs", auth, async (req, res) => {
    try {
      const userId = currentUserId(req);
      const limit = Math.min(Math.max(parseInt(String(req.query.limit ?? "50"), 10) || 50, 1), 100);
      const list = await jobs.listForUser(userId, limit);
      res.json({ jobs: list.map(toPublicJob) });
    } catch (err: unknown) {
      sendError(res, err, "failed to list jobs");
    }
  });

  return router;
}

// The device token stays server-side
function toPublicJob(job: JobRecord): Omit<JobRecord, "notificationToken"> {
  const { notificationToken: _notificationToken, ...rest } = job;
  return rest;
}
