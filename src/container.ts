import { config, type AppConfig } from "./config.js";
import { createSupabase } from "./db.js";
import { createClerkVerifier } from "./middleware/auth.js";
import { createJobRepository } from "./repository/jobs.js";
import { createListingRepository } from "./repository/listings.js";
import { FaceSwapService } from "./services/faceSwap.js";
import { createS3ImageStore } from "./services/imageStore.js";
import { JobCompletion } from "./services/jobCompletion.js";
import { JobReconciler } from "./services/jobReconciler.js";
import { NotificationDispatcher, createFirebaseMessaging } from "./services/notifications.js";
import { PredictionGateway } from "./services/predictionGateway.js";
import { SyncJobRunner } from "./services/syncJobRunner.js";
import { TryOnService } from "./services/tryOn.js";
import { WebhookProcessor } from "./services/webhookProcessor.js";

/**
 * Builds every long-lived client once. Throws `ConfigError` when the provider token is missing.
 */
export function createContainer(cfg: AppConfig = config) {
  const supabase = createSupabase({ url: cfg.supabase.url, serviceRoleKey: cfg.supabase.serviceRoleKey });
  const jobs = createJobRepository(supabase);
  const listings = createListingRepository(supabase);

  const gateway = new PredictionGateway({
    apiToken: cfg.replicate.apiToken,
    apiUrl: cfg.replicate.apiUrl,
    timeoutMs: cfg.replicate.requestTimeoutMs,
  });
  const notifications = new NotificationDispatcher(createFirebaseMessaging(cfg.firebase));
  const completion = new JobCompletion(jobs, gateway, notifications);

  const runner = new SyncJobRunner(gateway, {
    intervalMs: cfg.polling.intervalMs,
    maxAttempts: cfg.polling.maxAttempts,
  });

  return {
    supabase,
    jobs,
    notifications,
    reconciler: new JobReconciler(jobs, gateway, completion, { staleAfterMs: cfg.reconcile.staleAfterMs }),
    appDeps: {
      authVerifier: createClerkVerifier(cfg.clerk.secretKey),
      jobs,
      faceSwap: new FaceSwapService(listings, runner, cfg.models.faceSwap),
      tryOn: new TryOnService(jobs, gateway, {
        modelVersion: cfg.models.tryOn,
        callbackBaseUrl: cfg.callbackBaseUrl,
      }),
      webhooks: new WebhookProcessor(jobs, completion),
      images: createS3ImageStore(cfg.s3.bucket, cfg.s3.region),
      webhookSigningSecret: cfg.replicate.webhookSigningSecret,
    },
  };
}
