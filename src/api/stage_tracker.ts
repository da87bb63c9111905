/**
 * @fileoverview Per-query stage reports
 *
 * Every stage the orchestrator runs (or skips) produces one StageReport with
 * input/output counts, issues and duration. An observer receives a copy of
 * each report as it is finished; observer errors are logged and dropped.
 */

import { logWarning } from '../telemetry/logger.js';
import type { StageIssue, StageName, StageObserver, StageReport, StageStatus } from '../types.js';
import { getErrorMessage } from '../utils/errors.js';

export type StageContext = { stage: StageName; startedAt: number; inputCount: number; issues: StageIssue[] };
export type StageTracker = ReturnType<typeof createStageTracker>;

function cloneStageReport(report: StageReport): StageReport {
  return {
    ...report,
    results: { ...report.results },
    issues: report.issues.map((issue) => ({ ...issue })),
  };
}

function notifyStageObserver(onStage: StageObserver | undefined, report: StageReport): void {
  if (!onStage) {
    return;
  }
  const snapshot = cloneStageReport(report);
  try {
    onStage(snapshot);
  } catch (error) {
    logWarning('Stage observer failed', { stage: report.stage, error: getErrorMessage(error) });
  }
}

export function deriveStageStatus(inputCount: number, outputCount: number, issueCount: number): StageStatus {
  if (inputCount === 0) return 'skipped';
  if (outputCount === 0) return issueCount > 0 ? 'failed' : 'partial';
  if (issueCount > 0) return 'partial';
  return 'success';
}

export function createStageTracker(onStage?: StageObserver, now: () => number = Date.now) {
  const stages: StageReport[] = [];
  const active = new Map<StageName, StageContext>();
  const reported = new Set<StageName>();

  const issue = (stage: StageName, nextIssue: StageIssue): void => {
    active.get(stage)?.issues.push(nextIssue);
  };

  const start = (stage: StageName, inputCount: number): StageContext => {
    const context: StageContext = { stage, startedAt: now(), inputCount, issues: [] };
    active.set(stage, context);
    return context;
  };

  const finish = (
    context: StageContext,
    options: { outputCount: number; filteredCount?: number; status?: StageStatus }
  ): StageReport => {
    active.delete(context.stage);
    const filteredCount = options.filteredCount ?? Math.max(0, context.inputCount - options.outputCount);
    const status = options.status ?? deriveStageStatus(context.inputCount, options.outputCount, context.issues.length);
    const report: StageReport = {
      stage: context.stage,
      status,
      results: {
        inputCount: context.inputCount,
        outputCount: options.outputCount,
        filteredCount,
      },
      issues: context.issues,
      durationMs: Math.max(0, now() - context.startedAt),
    };
    stages.push(report);
    reported.add(context.stage);
    notifyStageObserver(onStage, report);
    return report;
  };

  /** Report every stage that never started as skipped. */
  const finalizeMissing = (stageNames: readonly StageName[], reason?: string): void => {
    for (const stage of stageNames) {
      if (reported.has(stage)) continue;
      const report: StageReport = {
        stage,
        status: 'skipped',
        results: { inputCount: 0, outputCount: 0, filteredCount: 0 },
        issues: reason ? [{ message: reason, severity: 'minor' }] : [],
        durationMs: 0,
      };
      stages.push(report);
      reported.add(stage);
      notifyStageObserver(onStage, report);
    }
  };

  return {
    start,
    finish,
    issue,
    finalizeMissing,
    report: () => stages.map(cloneStageReport),
  };
}
