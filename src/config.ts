import dotenv from "dotenv";

dotenv.config();

function intFromEnv(name: string, fallback: number): number {
  const parsed = parseInt(process.env[name] || "", 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export const config = {
  port: intFromEnv("PORT", 4000),
  supabase: {
    url: process.env.SUPABASE_URL || "",
    serviceRoleKey: process.env.SUPABASE_SERVICE_ROLE_KEY || "",
  },
  clerk: {
    secretKey: process.env.CLERK_SECRET_KEY || "",
  },
  replicate: {
    apiUrl: process.env.REPLICATE_API_URL || "https://api.replicate.com/v1",
    apiToken: process.env.REPLICATE_API_TOKEN || "",
    webhookSigningSecret: process.env.REPLICATE_WEBHOOK_SIGNING_SECRET || "",
    requestTimeoutMs: intFromEnv("REPLICATE_REQUEST_TIMEOUT_MS", 10_000),
  },
  models: {
    // InsightFace (deepinsight/insightface)
    faceSwap:
      process.env.FACE_SWAP_MODEL_VERSION ||
      "563a66acc0b39e5308e8372bed42504731b7fec3f21dcaf8210560059714933e",
    // IDM-VTON (yisol/idm-vton)
    tryOn:
      process.env.TRY_ON_MODEL_VERSION ||
      "906425dbca90663ff5427624839572cc56ea7d380343d13e2a4c4b09d3f0c30f",
  },
  // Public base URL the provider calls back into, e.g. https://api.example.com
  callbackBaseUrl: process.env.CALLBACK_BASE_URL || "",
  polling: {
    intervalMs: intFromEnv("PREDICTION_POLL_INTERVAL_MS", 4_000),
    maxAttempts: intFromEnv("PREDICTION_MAX_POLLS", 20),
  },
  reconcile: {
    intervalMs: intFromEnv("RECONCILE_INTERVAL_MS", 60_000),
    staleAfterMs: intFromEnv("RECONCILE_STALE_AFTER_MS", 10 * 60_000),
  },
  firebase: {
    projectId: process.env.FIREBASE_PROJECT_ID || "",
    clientEmail: process.env.FIREBASE_CLIENT_EMAIL || "",
    // Keys pasted into .env usually carry escaped newlines
    privateKey: (process.env.FIREBASE_PRIVATE_KEY || "").replace(/\\n/g, "\n"),
  },
  s3: {
    bucket: process.env.S3_BUCKET || "styling-studio-uploads",
    region: process.env.S3_REGION || "us-east-1",
  },
};

export type AppConfig = typeof config;

if (!config.callbackBaseUrl) {
  console.warn("[config] CALLBACK_BASE_URL is missing. Try-on submissions will be rejected until set.");
}

if (!config.replicate.webhookSigningSecret) {
  console.warn("[config] REPLICATE_WEBHOOK_SIGNING_SECRET is missing. Webhook signatures will not be verified.");
}

if (!config.supabase.url || !config.supabase.serviceRoleKey) {
  console.warn("[config] SUPABASE_URL or SUPABASE_SERVICE_ROLE_KEY is missing. Database operations will fail until set.");
}

if (!config.clerk.secretKey) {
  console.warn("[config] CLERK_SECRET_KEY is missing. Authentication will fail until set.");
}
