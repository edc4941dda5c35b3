import { describe, expect, it, vi } from "vitest";
import type { Message } from "firebase-admin/messaging";
import { NotificationDispatcher, tryOnNotification } from "../src/services/notifications.js";
import { processingJob } from "./helpers/stores.js";

const data = { type: "virtual_try_on", job_id: "job-1", status: "completed", result_url: "https://cdn.test/r.png" };

describe("NotificationDispatcher", () => {
  it("sends one message with platform delivery options", async () => {
    const send = vi.fn(async (_message: Message) => "message-id");
    const dispatcher = new NotificationDispatcher({ send });

    await dispatcher.send("device-token-1", "Try-On Ready!", "Done", data);

    expect(send).toHaveBeenCalledTimes(1);
    expect(send.mock.calls[0][0]).toEqual({
      token: "device-token-1",
      notification: { title: "Try-On Ready!", body: "Done" },
      data,
      apns: { payload: { aps: { sound: "default", badge: 1 } } },
      android: { priority: "high", notification: { sound: "default", channelId: "try_on_results" } },
    });
  });

  it("swallows send failures", async () => {
    const send = vi.fn(async (_message: Message): Promise<string> => {
      throw new Error("messaging/internal-error");
    });
    const dispatcher = new NotificationDispatcher({ send });

    await expect(dispatcher.send("device-token-1", "t", "b", data)).resolves.toBeUndefined();
    expect(send).toHaveBeenCalledTimes(1);
  });

  it("does nothing when messaging is not configured", async () => {
    const dispatcher = new NotificationDispatcher(null);

    await expect(dispatcher.send("device-token-1", "t", "b", data)).resolves.toBeUndefined();
  });

  it("tracks queued sends until drained", async () => {
    let release: (value: string) => void = () => {};
    const send = vi.fn((_message: Message) => new Promise<string>((resolve) => (release = resolve)));
    const dispatcher = new NotificationDispatcher({ send });

    dispatcher.enqueue({ target: "device-token-1", title: "t", body: "b", data });
    expect(dispatcher.pending).toBe(1);

    release("message-id");
    await dispatcher.drain();
    expect(dispatcher.pending).toBe(0);
  });
});

describe("tryOnNotification", () => {
  it("builds the success payload", () => {
    expect(tryOnNotification(processingJob(), { status: "completed", resultUrl: "https://cdn.test/r.png" })).toEqual({
      target: "device-token-1",
      title: "Try-On Ready!",
      body: "Your virtual try-on is ready! Tap to see how it looks.",
      data: { type: "virtual_try_on", job_id: "job-1", status: "completed", result_url: "https://cdn.test/r.png" },
    });
  });

  it("uses an empty result url for failures", () => {
    expect(tryOnNotification(processingJob(), { status: "failed", errorMessage: "OOM" })?.data).toEqual({
      type: "virtual_try_on",
      job_id: "job-1",
      status: "failed",
      result_url: "",
    });
  });

  it("words a model error differently from a missing image", () => {
    const job = processingJob();
    const failed = { status: "failed", errorMessage: "OOM" } as const;

    expect(tryOnNotification(job, failed, "provider_failed")?.body).toBe(
      "Your virtual try-on encountered an error. Please try again."
    );
    expect(tryOnNotification(job, failed, "canceled")?.body).toBe(
      "Your virtual try-on encountered an error. Please try again."
    );
    expect(tryOnNotification(job, failed, "no_output")?.body).toBe(
      "Your virtual try-on could not be completed. Please try again."
    );
  });

  it("returns null without a device token", () => {
    expect(tryOnNotification(processingJob({ notificationToken: null }), { status: "failed", errorMessage: "x" })).toBeNull();
  });
});
