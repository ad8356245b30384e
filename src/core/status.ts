/**
 * Dossier - Status Events
 *
 * Progress events for an observer of a pipeline run. Emission never fails the
 * caller: without a channel or job id nothing is sent, and delivery errors are
 * logged and dropped.
 */

import type { ResearchContext, StatusChannel, StatusEvent, StatusTag } from './types.js';

export type StatusTarget = Pick<ResearchContext, 'status_channel' | 'job_id'>;

export async function emitStatus(
  target: StatusTarget,
  status: StatusTag,
  message: string,
  result: Record<string, unknown> = {}
): Promise<void> {
  const channel = target.status_channel;
  const jobId = target.job_id;
  if (!channel || !jobId) return;

  try {
    await channel.sendStatusUpdate({ job_id: jobId, status, message, result });
  } catch (error) {
    console.error(`[status] Failed to deliver ${status} for job ${jobId}:`, error);
  }
}

/** Collects every event in memory. Handy for inspecting a finished run. */
export class MemoryStatusChannel implements StatusChannel {
  readonly events: StatusEvent[] = [];

  sendStatusUpdate(event: StatusEvent): void {
    this.events.push(event);
  }

  ofStatus(status: StatusTag): StatusEvent[] {
    return this.events.filter((e) => e.status === status);
  }
}
