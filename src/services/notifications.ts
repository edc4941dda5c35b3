import { cert, initializeApp, type App } from "firebase-admin/app";
import { getMessaging, type Message } from "firebase-admin/messaging";
import { config } from "../config.js";
import { logger } from "../logger.js";
import type { JobRecord, JobTerminalOutcome, PredictionFailureReason } from "../types.js";

/** The part of firebase-admin's `Messaging` this service needs. */
export interface MessagingSender {
  send(message: Message): Promise<string>;
}

export interface NotificationData {
  type: string;
  job_id: string;
  status: string;
  result_url: string;
}

export interface Notification {
  target: string;
  title: string;
  body: string;
  data: NotificationData;
}

/**
 * Best-effort push delivery. One attempt per notification; failures are logged and never reach
 * the caller, since the job row already holds the result.
 */
export class NotificationDispatcher {
  private readonly inFlight = new Set<Promise<void>>();

  constructor(private readonly messaging: MessagingSender | null) {}

  async send(target: string, title: string, body: string, data: NotificationData): Promise<void> {
    if (!this.messaging) {
      logger.warn({ jobId: data.job_id }, "Push messaging is not configured, skipping notification");
      return;
    }

    try {
      await this.messaging.send({
        token: target,
        notification: { title, body },
        data: { ...data },
        apns: {
          payload: {
            aps: {
              sound: "default",
              badge: 1,
            },
          },
        },
        android: {
          priority: "high",
          notification: {
            sound: "default",
            channelId: "try_on_results",
          },
        },
      });
      logger.info({ jobId: data.job_id, status: data.status }, "Push notification sent");
    } catch (err: unknown) {
      logger.error({ err, jobId: data.job_id }, "Push notification failed");
    }
  }

  /** Runs `send` in the background; the caller does not wait for delivery. */
  enqueue(notification: Notification): void {
    const task = this.send(notification.target, notification.title, notification.body, notification.data).finally(() => {
      this.inFlight.delete(task);
    });
    this.inFlight.add(task);
  }

  /** Resolves once every queued notification has been attempted. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  get pending(): number {
    return this.inFlight.size;
  }
}

function tryOnBody(outcome: JobTerminalOutcome, reason: PredictionFailureReason | undefined): string {
  if (outcome.status === "completed") return "Your virtual try-on is ready! Tap to see how it looks.";
  return reason === "no_output"
    ? "Your virtual try-on could not be completed. Please try again."
    : "Your virtual try-on encountered an error. Please try again.";
}

/** `reason` is why the prediction failed; it picks the failure wording. */
export function tryOnNotification(
  job: JobRecord,
  outcome: JobTerminalOutcome,
  reason?: PredictionFailureReason
): Notification | null {
  if (!job.notificationToken) return null;

  const completed = outcome.status === "completed";
  return {
    target: job.notificationToken,
    title: completed ? "Try-On Ready!" : "Try-On Failed",
    body: tryOnBody(outcome, reason),
    data: {
      type: job.kind,
      job_id: job.id,
      status: outcome.status,
      result_url: completed ? outcome.resultUrl : "",
    },
  };
}

/**
 * Builds a dedicated firebase-admin app from service account settings. Returns null when the
 * credentials are not configured.
 */
export function createFirebaseMessaging(firebase = config.firebase): MessagingSender | null {
  if (!firebase.projectId || !firebase.clientEmail || !firebase.privateKey) {
    logger.warn("Firebase credentials are missing. Push notifications are disabled.");
    return null;
  }

  const app: App = initializeApp(
    {
      credential: cert({
        projectId: firebase.projectId,
        clientEmail: firebase.clientEmail,
        privateKey: firebase.privateKey,
      }),
      projectId: firebase.projectId,
    },
    "notifications"
  );
  return getMessaging(app);
}
