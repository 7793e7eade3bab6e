import type { WorkflowEvent } from './events.ts';
import { type Usage, addUsage, emptyUsage } from './executors/types.ts';

/**
 * Format a duration in milliseconds to a human-readable string
 */
function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }
  return `${(ms / 1000).toFixed(1)}s`;
}

/**
 * Format a number with comma separators
 */
function formatNumber(num: number): string {
  return num.toLocaleString('en-US');
}

export interface StepUsage extends Usage {
  provider_calls: number;
}

export interface UsageSummary {
  total_provider_calls: number;
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
  cost_estimate: number;
  per_step: Record<string, StepUsage>;
}

/**
 * Accumulates provider usage per `ai_call` step id. Steps inside a map run
 * once per element, so their entries sum over every element.
 */
export class UsageTracker {
  private readonly perStep = new Map<string, StepUsage>();

  record(stepId: string, usage: Usage | undefined, providerCalls = 0): void {
    const current = this.perStep.get(stepId) ?? { ...emptyUsage(), provider_calls: 0 };
    this.perStep.set(stepId, {
      ...addUsage(current, usage),
      provider_calls: current.provider_calls + providerCalls,
    });
  }

  summary(): UsageSummary {
    let total = emptyUsage();
    let calls = 0;
    const perStep: Record<string, StepUsage> = {};
    for (const [stepId, usage] of this.perStep) {
      total = addUsage(total, usage);
      calls += usage.provider_calls;
      perStep[stepId] = { ...usage };
    }
    return { total_provider_calls: calls, ...total, per_step: perStep };
  }
}

interface StepTiming {
  stepId: string;
  stepType: string;
  durationMs: number;
}

/**
 * Extract timing information from top-level step.end events
 */
function extractStepTimings(events: WorkflowEvent[]): StepTiming[] {
  const timings: StepTiming[] = [];

  for (const event of events) {
    if (event.type === 'step.end' && event.depth === 0 && event.durationMs !== undefined) {
      timings.push({
        stepId: event.stepId,
        stepType: event.stepType,
        durationMs: event.durationMs,
      });
    }
  }

  return timings;
}

/**
 * Format timing summary from step events
 */
export function formatTimingSummary(events: WorkflowEvent[]): string | null {
  const timings = extractStepTimings(events);

  if (timings.length === 0) {
    return null;
  }

  const totalMs = timings.reduce((sum, t) => sum + t.durationMs, 0);

  if (totalMs === 0) {
    return null;
  }

  const sorted = [...timings].sort((a, b) => b.durationMs - a.durationMs);

  const lines: string[] = [];
  lines.push(`\n⏱️  Timing Summary (total: ${formatDuration(totalMs)})`);

  for (const timing of sorted) {
    const percentage = Math.round((timing.durationMs / totalMs) * 100);
    lines.push(`  • ${timing.stepId}: ${formatDuration(timing.durationMs)} (${percentage}%)`);
  }

  return lines.join('\n');
}

function formatCost(cost: number): string {
  if (cost === 0) return '$0.00';
  if (cost < 0.01) return '<$0.01';
  return `~$${cost.toFixed(2)}`;
}

/**
 * Format token usage summary; null when no provider was called
 */
export function formatUsageSummary(summary: UsageSummary): string | null {
  if (summary.total_provider_calls === 0) {
    return null;
  }

  const lines: string[] = [];
  lines.push('\n📊 Token Usage');
  lines.push(
    `  • Calls: ${formatNumber(summary.total_provider_calls)} | Input: ${formatNumber(summary.prompt_tokens)} | Output: ${formatNumber(summary.completion_tokens)} | Total: ${formatNumber(summary.total_tokens)}`
  );
  lines.push(`  • Estimated cost: ${formatCost(summary.cost_estimate)}`);

  return lines.join('\n');
}
