/**
 * Console Status Channel
 *
 * Prints pipeline status events for a CLI run. Progress goes to stderr so the
 * report itself can be piped from stdout.
 */

import { appendFile } from 'fs/promises';

import type { StatusChannel, StatusEvent } from '../core/types.js';
import { c } from './colors.js';

export interface ConsoleStatusOptions {
  /** Write report_chunk text to stdout as it arrives. */
  streamReport?: boolean;
  /** Suppress progress lines. */
  quiet?: boolean;
  /** Append every event to this JSON Lines file. */
  eventsFile?: string;
}

export class ConsoleStatusChannel implements StatusChannel {
  private streamed = false;

  constructor(private readonly options: ConsoleStatusOptions = {}) {}

  /** True once any report text has been written to stdout. */
  get hasStreamed(): boolean {
    return this.streamed;
  }

  async sendStatusUpdate(event: StatusEvent): Promise<void> {
    if (this.options.eventsFile) {
      await appendFile(this.options.eventsFile, JSON.stringify(event) + '\n');
    }

    if (event.status === 'report_chunk') {
      const chunk = event.result.chunk;
      if (this.options.streamReport && typeof chunk === 'string') {
        process.stdout.write(chunk);
        this.streamed = true;
      }
      return;
    }

    if (this.options.quiet) return;
    console.error(formatEvent(event));
  }
}

export function formatEvent(event: StatusEvent): string {
  const { result } = event;
  switch (event.status) {
    case 'briefing_start':
      return `  ${c.info('>')} ${event.message}${typeof result.total_docs === 'number' ? c.dim(` (${result.total_docs} documents)`) : ''}`;
    case 'briefing_complete':
      return `  ${c.success('✓')} ${event.message}`;
    case 'editor_complete':
      return `  ${c.success('✓')} ${c.bold(event.message)}`;
    default:
      return `  ${c.dim(event.message)}`;
  }
}
