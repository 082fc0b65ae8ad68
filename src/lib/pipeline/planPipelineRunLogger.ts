/**
 * Plan Pipeline Run Logger
 *
 * Structured per-run logging for the plan pipeline. Logs via console (JSON)
 * and optionally appends NDJSON to a local logfile. Fully behind env flags.
 *
 * Env flags:
 *   PLAN_PIPELINE_DEBUG_LOG=true      - Master switch
 *   PLAN_PIPELINE_DEBUG_VERBOSE=true  - Per-candidate events
 *   PLAN_PIPELINE_LOG_TO_FILE=true    - NDJSON file output under logs/plan-pipeline/
 *   PLAN_PIPELINE_DEBUG_MAX_EVENTS    - Cap on events per run (default 5000)
 */

import { createHash } from 'node:crypto';
import { appendFileSync, mkdirSync } from 'node:fs';
import { join, relative } from 'node:path';
import type { PlanType } from '@/src/lib/plans/plans.types';

function envFlag(name: string): boolean {
  const value = process.env[name];
  return value === 'true' || value === '1';
}

function hashUserKey(userKey: string): string {
  return createHash('sha256').update(userKey).digest('hex').slice(0, 8);
}

export type CreatePlanPipelineRunLoggerParams = {
  planType: PlanType;
  /** Anything identifying the user; only a short hash is logged */
  userKey?: string;
  runId?: string;
  /** Line sink, console.log by default */
  write?: (line: string) => void;
  logDir?: string;
};

export type StageCounts = {
  before: number;
  after: number;
};

export type RunSummary = {
  basePlansRequested: number;
  basePlansGenerated: number;
  candidates: number;
  topPlanIds: number[];
  persisted: boolean;
  durationMs: number;
};

export function createPlanPipelineRunLogger(
  params: CreatePlanPipelineRunLoggerParams,
) {
  const debugLog = envFlag('PLAN_PIPELINE_DEBUG_LOG');
  const debugVerbose = envFlag('PLAN_PIPELINE_DEBUG_VERBOSE');
  const logToFile = envFlag('PLAN_PIPELINE_LOG_TO_FILE');
  const maxEvents = Math.max(
    0,
    parseInt(process.env.PLAN_PIPELINE_DEBUG_MAX_EVENTS ?? '5000', 10) || 5000,
  );

  const { planType, write = (line: string) => console.log(line) } = params;
  const runId =
    params.runId ?? `run-${Date.now()}-${Math.random().toString(36).slice(2, 9)}`;
  const userKeyHash = params.userKey ? hashUserKey(params.userKey) : undefined;
  const logDir = params.logDir ?? join(process.cwd(), 'logs', 'plan-pipeline');

  let eventsCount = 0;
  let maxEventsLimitEmitted = false;
  let logFilePath: string | null = null;
  let fileWriteSkipped = false;

  if (debugLog && logToFile) {
    try {
      mkdirSync(logDir, { recursive: true });
      const dateStr = new Date().toISOString().slice(0, 10).replace(/-/g, '');
      const safeRunId = runId.replace(/[^a-zA-Z0-9-_]/g, '_').slice(0, 32);
      logFilePath = join(logDir, `${planType}-${dateStr}-${safeRunId}.ndjson`);
    } catch (error) {
      fileWriteSkipped = true;
      console.warn(
        '[PlanPipelineRunLogger] Log directory not writable:',
        error instanceof Error ? error.message : String(error),
      );
    }
  }

  function appendToFile(line: string): void {
    if (!logFilePath || fileWriteSkipped) return;
    try {
      appendFileSync(logFilePath, line + '\n');
    } catch (error) {
      fileWriteSkipped = true;
      console.warn(
        '[PlanPipelineRunLogger] Disabling file output:',
        error instanceof Error ? error.message : String(error),
      );
    }
  }

  function emit(name: string, payload: Record<string, unknown>): void {
    if (!debugLog) return;
    if (eventsCount >= maxEvents) {
      if (!maxEventsLimitEmitted) {
        maxEventsLimitEmitted = true;
        const line = JSON.stringify({
          ts: new Date().toISOString(),
          runId,
          planType,
          event: 'log_limit_reached',
          limit: maxEvents,
        });
        write(line);
        appendToFile(line);
      }
      return;
    }
    eventsCount++;
    const line = JSON.stringify({
      ts: new Date().toISOString(),
      runId,
      planType,
      event: name,
      ...(userKeyHash ? { userKeyHash } : {}),
      ...payload,
    });
    write(line);
    appendToFile(line);
  }

  function event(name: string, payload: Record<string, unknown> = {}): void {
    emit(name, payload);
  }

  function stage(name: string, counts: StageCounts, durationMs?: number): void {
    emit('stage_result', { stage: name, counts, durationMs });
  }

  function generationFailed(attempt: number, reason: string): void {
    emit('generation_failed', { attempt, reason });
  }

  /** Per-candidate event, only with PLAN_PIPELINE_DEBUG_VERBOSE */
  function candidateAssessed(candidate: {
    id: number;
    variant: string;
    score: number;
    status: string;
    riskFactors: number;
  }): void {
    if (!debugVerbose) return;
    emit('candidate_assessed', candidate);
  }

  function runSummary(summary: RunSummary): void {
    emit('run_summary', summary);
  }

  /** Safe debug metadata for CLI output (no PII, no absolute paths) */
  function getDebugMeta(): { runId: string; logFileRelativePath?: string } {
    const meta: { runId: string; logFileRelativePath?: string } = { runId };
    if (logFilePath && !fileWriteSkipped) {
      meta.logFileRelativePath = relative(process.cwd(), logFilePath);
    }
    return meta;
  }

  return {
    runId,
    event,
    stage,
    generationFailed,
    candidateAssessed,
    runSummary,
    getDebugMeta,
    fileWriteSkipped: () => fileWriteSkipped,
  };
}

export type PlanPipelineRunLogger = ReturnType<typeof createPlanPipelineRunLogger>;
