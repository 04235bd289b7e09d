/**
 * In-process counters for the refactoring service, exposed as a JSON
 * snapshot at /metrics. Nothing here is persisted.
 */

type LatAgg = { count: number; sum: number; min: number; max: number };

const mkLat = (): LatAgg => ({ count: 0, sum: 0, min: Number.POSITIVE_INFINITY, max: 0 });

function observe(agg: LatAgg, ms: number): void {
  agg.count++;
  agg.sum += ms;
  agg.min = Math.min(agg.min, ms);
  agg.max = Math.max(agg.max, ms);
}

function summarize(agg: LatAgg) {
  return {
    count: agg.count,
    avg_ms: agg.count ? Math.round(agg.sum / agg.count) : 0,
    min_ms: agg.count ? agg.min : 0,
    max_ms: agg.max,
  };
}

let runsStarted = 0;
let runsSucceeded = 0;
let runsFailed = 0;
let busyRejections = 0;
const runLatency = mkLat();
const loopOutcomes: Record<'EXITED' | 'CAPPED', number> = { EXITED: 0, CAPPED: 0 };
let loopIterations = 0;
const stageLatency = new Map<string, LatAgg & { failures: number }>();

export function incRunStarted(): void {
  runsStarted++;
}

export function observeRun(success: boolean, ms: number): void {
  if (success) runsSucceeded++;
  else runsFailed++;
  observe(runLatency, ms);
}

export function incBusyRejected(): void {
  busyRejections++;
}

export function observeLoop(outcome: 'EXITED' | 'CAPPED', iterations: number): void {
  loopOutcomes[outcome]++;
  loopIterations += iterations;
}

export function observeStage(role: string, ms: number, ok: boolean): void {
  let agg = stageLatency.get(role);
  if (!agg) {
    agg = { ...mkLat(), failures: 0 };
    stageLatency.set(role, agg);
  }
  observe(agg, ms);
  if (!ok) agg.failures++;
}

export function snapshot() {
  const stages: Record<string, ReturnType<typeof summarize> & { failures: number }> = {};
  for (const [role, agg] of stageLatency) stages[role] = { ...summarize(agg), failures: agg.failures };
  return {
    runs: {
      started: runsStarted,
      succeeded: runsSucceeded,
      failed: runsFailed,
      busy_rejections: busyRejections,
      latency: summarize(runLatency),
    },
    refinement: {
      exited: loopOutcomes.EXITED,
      capped: loopOutcomes.CAPPED,
      iterations: loopIterations,
    },
    stages,
  };
}

export function resetMetrics(): void {
  runsStarted = 0;
  runsSucceeded = 0;
  runsFailed = 0;
  busyRejections = 0;
  Object.assign(runLatency, mkLat());
  loopOutcomes.EXITED = 0;
  loopOutcomes.CAPPED = 0;
  loopIterations = 0;
  stageLatency.clear();
}
