import type { ActionId, ActionKind, ReconcilePlan } from './plan.entity.js';

export type RunType = 'apply';
export type RunStatus = 'pending' | 'running' | 'succeeded' | 'failed' | 'cancelled';

export interface RunReceipt {
  actionId: ActionId;
  kind: ActionKind;
  status: 'success' | 'failure' | 'skipped';
  result?: Record<string, unknown>;
  error?: string;
  durationMs?: number;
  timestamp: string;
}

export interface Run {
  id: string;
  serviceName: string;
  platform: string;
  type: RunType;
  status: RunStatus;
  plan: ReconcilePlan;
  receipts: RunReceipt[];
  error: string | null;
  startedAt: Date | null;
  completedAt: Date | null;
  createdAt: Date;
}

export interface CreateRunInput {
  serviceName: string;
  platform: string;
  type: RunType;
  plan: ReconcilePlan;
}
