// Server-sent events framing for run streams
//
//   id: 3            (log events only, so Last-Event-ID can resume)
//   event: log | done | error
//   data: <single-line JSON>

import type { StreamEvent } from '../types/run.js';
import { InvalidInputError } from '../types/errors.js';

export const SSE_HEADERS: Readonly<Record<string, string>> = {
  'Content-Type': 'text/event-stream',
  'Cache-Control': 'no-cache',
  Connection: 'keep-alive',
  'X-Accel-Buffering': 'no',
};

export const SSE_KEEPALIVE = ': keepalive\n\n';

export function formatSseEvent(event: StreamEvent): string {
  switch (event.type) {
    case 'log':
      return `id: ${event.sequence}\nevent: log\ndata: ${JSON.stringify({
        sequence: event.sequence,
        text: event.text,
        isError: event.isError,
      })}\n\n`;
    case 'done':
      return `event: done\ndata: ${JSON.stringify(event.report)}\n\n`;
    case 'error':
      return `event: error\ndata: ${JSON.stringify({
        message: event.message,
        kind: event.kind,
        ...(event.stage !== undefined ? { stage: event.stage } : {}),
      })}\n\n`;
  }
}

function parseSequence(raw: string, what: string): number {
  if (!/^\d+$/.test(raw.trim())) {
    throw new InvalidInputError(`${what} must be a non-negative integer, got: ${raw}`);
  }
  return Number.parseInt(raw, 10);
}

/**
 * Resolve where a (re)connecting client resumes.
 * An explicit `from` query wins; otherwise Last-Event-ID + 1; otherwise 0.
 */
export function resolveFromSequence(from: unknown, lastEventId: string | undefined): number {
  if (typeof from === 'string' && from !== '') {
    return parseSequence(from, 'from');
  }
  if (from !== undefined && typeof from !== 'string') {
    throw new InvalidInputError('from must be a single value');
  }
  if (lastEventId !== undefined && lastEventId !== '') {
    return parseSequence(lastEventId, 'Last-Event-ID') + 1;
  }
  return 0;
}

export interface SseFrame {
  id?: string;
  event: string;
  data: string;
}

/**
 * Parse an SSE text body into frames. Comment lines are skipped and
 * multi-line data fields are joined with "\n".
 */
export function parseSseFrames(body: string): SseFrame[] {
  const frames: SseFrame[] = [];
  for (const block of body.split(/\n\n/)) {
    let id: string | undefined;
    let event = 'message';
    const data: string[] = [];
    let hasField = false;

    for (const line of block.split('\n')) {
      if (line === '' || line.startsWith(':')) continue;
      const colon = line.indexOf(':');
      const field = colon === -1 ? line : line.slice(0, colon);
      const value = colon === -1 ? '' : line.slice(colon + 1).replace(/^ /, '');
      hasField = true;
      if (field === 'id') id = value;
      else if (field === 'event') event = value;
      else if (field === 'data') data.push(value);
    }

    if (hasField) frames.push({ ...(id !== undefined ? { id } : {}), event, data: data.join('\n') });
  }
  return frames;
}
