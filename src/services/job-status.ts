/**
 * Job status state machine.
 * Capability flags are derived from the status value on every call and never stored.
 */

import type { VisualizationJobStatus } from '@/types/visualization.js';
import { InvalidTransitionError } from '@/shared/errors.js';

const TRANSITIONS: Record<VisualizationJobStatus, readonly VisualizationJobStatus[]> = {
  pending: ['queued', 'cancelled'],
  queued: ['generating_prompt', 'failed', 'cancelled'],
  generating_prompt: ['processing', 'failed'],
  processing: ['uploading', 'failed'],
  uploading: ['completed', 'failed'],
  completed: [],
  // retry edges
  failed: ['pending'],
  cancelled: ['pending'],
};

const STATUS_LABELS: Record<VisualizationJobStatus, string> = {
  pending: 'Waiting in queue',
  queued: 'Queued for processing',
  generating_prompt: 'Generating prompt',
  processing: 'Generating image',
  uploading: 'Uploading image',
  completed: 'Completed',
  failed: 'Failed',
  cancelled: 'Cancelled',
};

export function allowedTransitions(from: VisualizationJobStatus): readonly VisualizationJobStatus[] {
  return TRANSITIONS[from];
}

export function canTransition(from: VisualizationJobStatus, to: VisualizationJobStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function assertTransition(from: VisualizationJobStatus, to: VisualizationJobStatus): void {
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(from, to);
  }
}

export function canCancel(status: VisualizationJobStatus): boolean {
  return status === 'pending' || status === 'queued';
}

export function canRetry(status: VisualizationJobStatus): boolean {
  return status === 'failed' || status === 'cancelled';
}

export function isFinal(status: VisualizationJobStatus): boolean {
  return status === 'completed' || status === 'failed' || status === 'cancelled';
}

export function isProcessing(status: VisualizationJobStatus): boolean {
  return status === 'generating_prompt' || status === 'processing' || status === 'uploading';
}

export function statusLabel(status: VisualizationJobStatus): string {
  return STATUS_LABELS[status];
}
