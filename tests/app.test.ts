import type { Server } from "node:http";
import { afterEach, describe, expect, it, vi } from "vitest";
import type { Message } from "firebase-admin/messaging";
import { createApp } from "../src/app.js";
import type { AuthVerifier } from "../src/middleware/auth.js";
import { FaceSwapService } from "../src/services/faceSwap.js";
import type { ImageStore, UploadedImage } from "../src/services/imageStore.js";
import { JobCompletion } from "../src/services/jobCompletion.js";
import { NotificationDispatcher } from "../src/services/notifications.js";
import { SyncJobRunner } from "../src/services/syncJobRunner.js";
import { TryOnService } from "../src/services/tryOn.js";
import { WebhookProcessor } from "../src/services/webhookProcessor.js";
import { signWebhookPayload } from "../src/services/webhookSignature.js";
import { gatewayWithResponses, jsonResponse, predictionBody } from "./helpers/provider.js";
import { InMemoryJobStore, InMemoryListingStore, processingJob } from "./helpers/stores.js";

const AUTH = { Authorization: "Bearer token-user-1" };
const SECRET = `whsec_${Buffer.from("test-secret").toString("base64")}`;

const authVerifier: AuthVerifier = {
  async verify(token) {
    return token.startsWith("token-") ? token.slice("token-".length) : null;
  },
};

class RecordingImageStore implements ImageStore {
  readonly uploads: Array<{ userId: string; image: UploadedImage }> = [];

  async put(userId: string, image: UploadedImage): Promise<string> {
    this.uploads.push({ userId, image });
    return `https://uploads.test/${userId}/${image.originalName}`;
  }
}

let server: Server | null = null;

afterEach(async () => {
  const running = server;
  server = null;
  if (running) {
    await new Promise<void>((resolve) => running.close(() => resolve()));
  }
});

async function startApp(options: { providerResponses?: Array<Response | Error>; signingSecret?: string } = {}) {
  const jobs = new InMemoryJobStore();
  const listings = new InMemoryListingStore([
    { id: "listing-1", lenderId: "user-1", imageUrl: "https://cdn.test/listing.jpg", displayImageUrl: null, isFaceSwapped: false },
  ]);
  const images = new RecordingImageStore();
  const { gateway } = gatewayWithResponses(options.providerResponses ?? []);
  const send = vi.fn(async (_message: Message) => "message-id");
  const notifications = new NotificationDispatcher({ send });

  const app = createApp({
    authVerifier,
    jobs,
    faceSwap: new FaceSwapService(listings, new SyncJobRunner(gateway, { maxAttempts: 2, sleep: async () => {} }), "insightface-v1"),
    tryOn: new TryOnService(jobs, gateway, { modelVersion: "idm-vton-v1", callbackBaseUrl: "https://backend.test" }),
    webhooks: new WebhookProcessor(jobs, new JobCompletion(jobs, gateway, notifications)),
    images,
    webhookSigningSecret: options.signingSecret ?? "",
  });

  const started = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, "127.0.0.1", () => resolve(listening));
  });
  server = started;
  const address = started.address();
  if (!address || typeof address === "string") throw new Error("server is not listening on a TCP port");
  return { baseUrl: `http://127.0.0.1:${address.port}`, jobs, listings, images, send, notifications };
}

const tryOnBody = {
  user_image_url: "https://cdn.test/me.jpg",
  garment_image_url: "https://cdn.test/shirt.jpg",
  garment_description: "red linen shirt",
  fcm_token: "device-token-1",
};

function postJson(url: string, body: unknown, headers: Record<string, string> = AUTH) {
  return fetch(url, {
    method: "POST",
    headers: { "Content-Type": "application/json", ...headers },
    body: JSON.stringify(body),
  });
}

describe("HTTP API", () => {
  it("answers the health check", async () => {
    const { baseUrl } = await startApp();

    const response = await fetch(`${baseUrl}/api/health`);

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({ ok: true });
  });

  describe("POST /api/ai/try-on", () => {
    it("requires authentication", async () => {
      const { baseUrl } = await startApp();

      const response = await postJson(`${baseUrl}/api/ai/try-on`, tryOnBody, {});

      expect(response.status).toBe(401);
      expect(await response.json()).toEqual({ error: "Authentication required", code: "UNAUTHORIZED" });
    });

    it("returns the job id before the prediction runs", async () => {
      const { baseUrl, jobs } = await startApp({
        providerResponses: [jsonResponse(predictionBody("starting", { id: "pred-42" }), 201)],
      });

      const response = await postJson(`${baseUrl}/api/ai/try-on`, tryOnBody);

      expect(response.status).toBe(202);
      expect(await response.json()).toEqual({
        job_id: "job-1",
        message: "Your virtual try-on is processing. You will receive a push notification when it's ready.",
      });
      expect(jobs.jobs.get("job-1")).toMatchObject({ userId: "user-1", predictionId: "pred-42", status: "processing" });
    });

    it("validates the body", async () => {
      const { baseUrl } = await startApp();
      const { fcm_token: _omitted, ...body } = tryOnBody;

      const response = await postJson(`${baseUrl}/api/ai/try-on`, body);

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({ error: "`fcm_token` required", code: "VALIDATION_ERROR" });
    });

    it("reports a provider rejection as start failure", async () => {
      const { baseUrl } = await startApp({ providerResponses: [jsonResponse({ detail: "Unauthenticated" }, 401)] });

      const response = await postJson(`${baseUrl}/api/ai/try-on`, tryOnBody);

      expect(response.status).toBe(502);
      expect(await response.json()).toMatchObject({ code: "START_FAILED" });
    });
  });

  describe("POST /api/ai/face-swap", () => {
    const body = { listing_id: "listing-1", image_url: "https://cdn.test/selfie.jpg" };

    it("returns the new display image", async () => {
      const { baseUrl, listings } = await startApp({
        providerResponses: [
          jsonResponse(predictionBody("starting"), 201),
          jsonResponse(predictionBody("succeeded", { output: ["https://cdn.test/swapped.png"] })),
        ],
      });

      const response = await postJson(`${baseUrl}/api/ai/face-swap`, body);

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({ display_image_url: "https://cdn.test/swapped.png" });
      expect(listings.listings.get("listing-1")?.displayImageUrl).toBe("https://cdn.test/swapped.png");
    });

    it("maps an exhausted poll budget to a deadline error", async () => {
      const { baseUrl } = await startApp({
        providerResponses: [
          jsonResponse(predictionBody("starting"), 201),
          jsonResponse(predictionBody("processing")),
          jsonResponse(predictionBody("processing")),
        ],
      });

      const response = await postJson(`${baseUrl}/api/ai/face-swap`, body);

      expect(response.status).toBe(504);
      expect(await response.json()).toEqual({
        error: "Prediction pred-1 did not complete within 2 status checks.",
        code: "DEADLINE_EXCEEDED",
      });
    });

    it("maps a model failure separately from a timeout", async () => {
      const { baseUrl } = await startApp({
        providerResponses: [
          jsonResponse(predictionBody("starting"), 201),
          jsonResponse(predictionBody("failed", { error: "no face detected" })),
        ],
      });

      const response = await postJson(`${baseUrl}/api/ai/face-swap`, body);

      expect(response.status).toBe(502);
      expect(await response.json()).toEqual({ error: "no face detected", code: "MODEL_FAILED" });
    });

    it("forbids swapping on someone else's listing", async () => {
      const { baseUrl } = await startApp();

      const response = await postJson(`${baseUrl}/api/ai/face-swap`, body, { Authorization: "Bearer token-user-2" });

      expect(response.status).toBe(403);
      expect(await response.json()).toEqual({
        error: "You can only apply face swap to your own listings.",
        code: "FORBIDDEN",
      });
    });
  });

  describe("GET /api/ai/jobs/:jobId", () => {
    it("returns the job to its owner without the device token", async () => {
      const { baseUrl, jobs } = await startApp();
      jobs.seed(processingJob());

      const response = await fetch(`${baseUrl}/api/ai/jobs/job-1`, { headers: AUTH });
      const payload = await response.json();

      expect(response.status).toBe(200);
      expect(payload).toMatchObject({ job: { id: "job-1", status: "processing", predictionId: "pred-1" } });
      expect(payload).not.toHaveProperty("job.notificationToken");
    });

    it("hides other users' jobs", async () => {
      const { baseUrl, jobs } = await startApp();
      jobs.seed(processingJob());

      const response = await fetch(`${baseUrl}/api/ai/jobs/job-1`, { headers: { Authorization: "Bearer token-user-2" } });

      expect(response.status).toBe(404);
    });
  });

  describe("POST /api/webhooks/replicate", () => {
    const url = (baseUrl: string) => `${baseUrl}/api/webhooks/replicate`;

    it("rejects other methods", async () => {
      const { baseUrl } = await startApp();

      const response = await fetch(url(baseUrl));

      expect(response.status).toBe(405);
    });

    it("rejects malformed payloads", async () => {
      const { baseUrl } = await startApp();

      const missingStatus = await postJson(url(baseUrl), { id: "pred-1" }, {});
      const notJson = await fetch(url(baseUrl), { method: "POST", body: "{not json" });

      expect(missingStatus.status).toBe(400);
      expect(notJson.status).toBe(400);
    });

    it("completes the matching job", async () => {
      const { baseUrl, jobs, send, notifications } = await startApp();
      jobs.seed(processingJob());

      const response = await postJson(
        url(baseUrl),
        predictionBody("succeeded", { output: ["https://cdn.test/tryon.png"] }),
        {}
      );
      await notifications.drain();

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({ success: true, job_id: "job-1", status: "completed", duplicate: false });
      expect(jobs.jobs.get("job-1")?.resultUrl).toBe("https://cdn.test/tryon.png");
      expect(send).toHaveBeenCalledTimes(1);
    });

    it("acknowledges unknown predictions", async () => {
      const { baseUrl, jobs } = await startApp();

      const response = await postJson(url(baseUrl), predictionBody("failed", { id: "pred-ghost", error: "OOM" }), {});

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({ success: true, message: "No matching job found." });
      expect(jobs.jobs.size).toBe(0);
    });

    it("answers 500 when the store is unavailable", async () => {
      const { baseUrl, jobs } = await startApp();
      vi.spyOn(jobs, "findByPredictionId").mockRejectedValueOnce(new Error("connection reset"));

      const response = await postJson(url(baseUrl), predictionBody("failed", { error: "OOM" }), {});

      expect(response.status).toBe(500);
    });

    describe("with a signing secret", () => {
      it("rejects unsigned deliveries", async () => {
        const { baseUrl, jobs } = await startApp({ signingSecret: SECRET });
        jobs.seed(processingJob());

        const response = await postJson(url(baseUrl), predictionBody("failed", { error: "OOM" }), {});

        expect(response.status).toBe(401);
        expect(jobs.jobs.get("job-1")?.status).toBe("processing");
      });

      it("accepts signed deliveries", async () => {
        const { baseUrl, jobs } = await startApp({ signingSecret: SECRET });
        jobs.seed(processingJob());
        const body = JSON.stringify(predictionBody("failed", { error: "OOM" }));
        const timestamp = String(Math.floor(Date.now() / 1000));

        const response = await fetch(url(baseUrl), {
          method: "POST",
          headers: {
            "Content-Type": "application/json",
            "webhook-id": "msg_1",
            "webhook-timestamp": timestamp,
            "webhook-signature": `v1,${signWebhookPayload(SECRET, "msg_1", timestamp, body)}`,
          },
          body,
        });

        expect(response.status).toBe(200);
        expect(jobs.jobs.get("job-1")).toMatchObject({ status: "failed", errorMessage: "OOM" });
      });
    });
  });

  describe("POST /api/uploads/image", () => {
    it("stores the image and returns its url", async () => {
      const { baseUrl, images } = await startApp();
      const form = new FormData();
      form.append("image", new Blob(["fake-png-bytes"], { type: "image/png" }), "selfie.png");

      const response = await fetch(`${baseUrl}/api/uploads/image`, { method: "POST", headers: AUTH, body: form });

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({ success: true, url: "https://uploads.test/user-1/selfie.png" });
      expect(images.uploads[0].image.mimeType).toBe("image/png");
      expect(images.uploads[0].image.buffer.toString()).toBe("fake-png-bytes");
    });

    it("rejects non-image files", async () => {
      const { baseUrl, images } = await startApp();
      const form = new FormData();
      form.append("image", new Blob(["hello"], { type: "text/plain" }), "notes.txt");

      const response = await fetch(`${baseUrl}/api/uploads/image`, { method: "POST", headers: AUTH, body: form });

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({
        error: "Invalid file type. Only JPEG, PNG and WebP images are allowed.",
        code: "VALIDATION_ERROR",
      });
      expect(images.uploads).toHaveLength(0);
    });
  });
});
