import { randomUUID } from "node:crypto";
import type { SupabaseClient } from "@supabase/supabase-js";
import { JOBS_TABLE } from "../db.js";
import { DatabaseError, errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import type { JobKind, JobRecord, JobStatus, JobTerminalOutcome, NewJob, TryOnJobInput } from "../types.js";

/**
 * Persistence for asynchronous prediction jobs. The webhook path only ever reads through
 * `findByPredictionId` and writes through `markTerminal`.
 */
export interface JobStore {
  create(job: NewJob): Promise<string>;
  findByPredictionId(predictionId: string): Promise<JobRecord | null>;
  /** Returns false when the job had already left `processing`. */
  markTerminal(jobId: string, outcome: JobTerminalOutcome): Promise<boolean>;
  getForUser(jobId: string, userId: string): Promise<JobRecord | null>;
  listForUser(userId: string, limit?: number): Promise<JobRecord[]>;
  listStale(createdBefore: Date, limit?: number): Promise<JobRecord[]>;
}

interface JobRow {
  id: string;
  user_id: string;
  kind: JobKind;
  prediction_id: string;
  notification_token: string | null;
  input: TryOnJobInput;
  status: JobStatus;
  result_url: string | null;
  error_message: string | null;
  created_at: string;
  updated_at: string;
}

export function createJobRepository(supabase: SupabaseClient): JobStore {
  return {
    async create(job) {
      const id = randomUUID();
      const now = new Date().toISOString();
      try {
        const { error } = await supabase.from(JOBS_TABLE).insert({
          id,
          user_id: job.userId,
          kind: job.kind,
          prediction_id: job.predictionId,
          notification_token: job.notificationToken,
          input: job.input,
          status: "processing",
          result_url: null,
          error_message: null,
          created_at: now,
          updated_at: now,
        });

        if (error) throw error;
        return id;
      } catch (err: unknown) {
        logger.error({ err, predictionId: job.predictionId }, "Failed to create job in database");
        throw new DatabaseError(errorMessage(err));
      }
    },

    async findByPredictionId(predictionId) {
      try {
        const { data, error } = await supabase
          .from(JOBS_TABLE)
          .select("*")
          .eq("prediction_id", predictionId)
          .limit(1)
          .maybeSingle();

        if (error) throw error;
        return data ? mapRow(data) : null;
      } catch (err: unknown) {
        logger.error({ err, predictionId }, "Failed to look up job by prediction id");
        throw new DatabaseError(errorMessage(err));
      }
    },

    async markTerminal(jobId, outcome) {
      try {
        // Conditional on `processing` so concurrent or repeated deliveries transition once
        const { data, error } = await supabase
          .from(JOBS_TABLE)
          .update({
            status: outcome.status,
            result_url: outcome.status === "completed" ? outcome.resultUrl : null,
            error_message: outcome.status === "failed" ? outcome.errorMessage : null,
            updated_at: new Date().toISOString(),
          })
          .eq("id", jobId)
          .eq("status", "processing")
          .select("id");

        if (error) throw error;
        return (data ?? []).length > 0;
      } catch (err: unknown) {
        logger.error({ err, jobId }, "Failed to mark job terminal");
        throw new DatabaseError(errorMessage(err));
      }
    },

    async getForUser(jobId, userId) {
      try {
        const { data, error } = await supabase
          .from(JOBS_TABLE)
          .select("*")
          .eq("id", jobId)
          .eq("user_id", userId)
          .maybeSingle();

        if (error) throw error;
        return data ? mapRow(data) : null;
      } catch (err: unknown) {
        logger.error({ err, jobId }, "Failed to get job for user from database");
        throw new DatabaseError(errorMessage(err));
      }
    },

    async listForUser(userId, limit = 50) {
      try {
        const { data, error } = await supabase
          .from(JOBS_TABLE)
          .select("*")
          .eq("user_id", userId)
          .order("created_at", { ascending: false })
          .limit(limit);

        if (error) throw error;
        if (!data) return [];
        return data.map(mapRow);
      } catch (err: unknown) {
        logger.error({ err, userId }, "Failed to list jobs for user from database");
        throw new DatabaseError(errorMessage(err));
      }
    },

    async listStale(createdBefore, limit = 100) {
      try {
        const { data, error } = await supabase
          .from(JOBS_TABLE)
          .select("*")
          .eq("status", "processing")
          .lt("created_at", createdBefore.toISOString())
          .order("created_at", { ascending: true })
          .limit(limit);

        if (error) throw error;
        if (!data) return [];
        return data.map(mapRow);
      } catch (err: unknown) {
        logger.error({ err }, "Failed to list stale jobs from database");
        throw new DatabaseError(errorMessage(err));
      }
    },
  };
}

function mapRow(row: JobRow): JobRecord {
  return {
    id: row.id,
    userId: row.user_id,
    kind: row.kind,
    predictionId: row.prediction_id,
    notificationToken: row.notification_token || null,
    input: row.input,
    status: row.status,
    resultUrl: row.result_url,
    errorMessage: row.error_message,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}
