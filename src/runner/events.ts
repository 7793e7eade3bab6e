import type { StepStatusType, WorkflowStatusType } from '../types/status.ts';

export type WorkflowEvent =
  | {
      type: 'workflow.start';
      timestamp: string;
      runId: string;
      workflow: string;
      inputs?: Record<string, unknown>;
    }
  | {
      type: 'step.start';
      timestamp: string;
      runId: string;
      workflow: string;
      stepId: string;
      stepType: string;
      /** 0 at the top level, +1 per collection or conditional */
      depth: number;
      stepIndex?: number;
      totalSteps?: number;
    }
  | {
      type: 'step.end';
      timestamp: string;
      runId: string;
      workflow: string;
      stepId: string;
      stepType: string;
      depth: number;
      status: StepStatusType;
      durationMs?: number;
      error?: string;
      stepIndex?: number;
      totalSteps?: number;
    }
  | {
      type: 'item.start';
      timestamp: string;
      runId: string;
      workflow: string;
      stepId: string;
      index: number;
      total: number;
    }
  | {
      type: 'item.end';
      timestamp: string;
      runId: string;
      workflow: string;
      stepId: string;
      index: number;
      total: number;
      status: StepStatusType;
      attempts: number;
      durationMs?: number;
      error?: string;
    }
  | {
      type: 'workflow.complete';
      timestamp: string;
      runId: string;
      workflow: string;
      status: WorkflowStatusType;
      output?: unknown;
      error?: string;
    };

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/** What executors emit; the runner stamps the run fields. */
export type WorkflowEventPayload = DistributiveOmit<WorkflowEvent, 'timestamp' | 'runId' | 'workflow'>;

export type EventHandler = (event: WorkflowEvent) => void;
