// Tests for SSE framing and resume position parsing

import { describe, it, expect } from 'vitest';
import { formatSseEvent, parseSseFrames, resolveFromSequence, SSE_KEEPALIVE } from '../gateway/sse.js';
import { InvalidInputError } from '../types/errors.js';
import { SAMPLE_ARTICLES, SAMPLE_RISKS, SAMPLE_STRATEGY, SAMPLE_TRENDS } from './helpers/fake-stages.js';

describe('formatSseEvent', () => {
  it('frames log events with an id for resumption', () => {
    expect(formatSseEvent({ type: 'log', sequence: 3, text: 'hello', isError: false }))
      .toBe('id: 3\nevent: log\ndata: {"sequence":3,"text":"hello","isError":false}\n\n');
  });

  it('frames the done event with the report as data', () => {
    const report = {
      topic: 'AI hardware market',
      articles: SAMPLE_ARTICLES,
      trends: SAMPLE_TRENDS,
      strategy: SAMPLE_STRATEGY,
      risks: SAMPLE_RISKS,
      generatedAt: '2026-01-01T00:00:00.000Z',
    };
    expect(formatSseEvent({ type: 'done', report }))
      .toBe(`event: done\ndata: ${JSON.stringify(report)}\n\n`);
  });

  it('frames the error event with kind and stage', () => {
    expect(formatSseEvent({ type: 'error', message: 'Trend Agent failed: boom', kind: 'StageFailure', stage: 'trends' }))
      .toBe('event: error\ndata: {"message":"Trend Agent failed: boom","kind":"StageFailure","stage":"trends"}\n\n');
  });

  it('omits the stage for internal errors', () => {
    expect(formatSseEvent({ type: 'error', message: 'Pipeline error: x', kind: 'Internal' }))
      .toBe('event: error\ndata: {"message":"Pipeline error: x","kind":"Internal"}\n\n');
  });

  it('keeps multi-line text on a single data line', () => {
    const frame = formatSseEvent({ type: 'log', sequence: 0, text: 'line one\nline two', isError: false });
    expect(frame.split('\n')).toHaveLength(5);
  });
});

describe('parseSseFrames', () => {
  it('parses frames and skips comments', () => {
    const body =
      SSE_KEEPALIVE +
      formatSseEvent({ type: 'log', sequence: 0, text: 'start', isError: false }) +
      formatSseEvent({ type: 'error', message: 'failed', kind: 'Internal' });

    expect(parseSseFrames(body)).toEqual([
      { id: '0', event: 'log', data: '{"sequence":0,"text":"start","isError":false}' },
      { event: 'error', data: '{"message":"failed","kind":"Internal"}' },
    ]);
  });

  it('joins multi-line data fields', () => {
    expect(parseSseFrames('data: a\ndata: b\n\n')).toEqual([{ event: 'message', data: 'a\nb' }]);
  });
});

describe('resolveFromSequence', () => {
  it('defaults to 0', () => {
    expect(resolveFromSequence(undefined, undefined)).toBe(0);
  });

  it('uses the from query parameter', () => {
    expect(resolveFromSequence('3', undefined)).toBe(3);
  });

  it('resumes after Last-Event-ID', () => {
    expect(resolveFromSequence(undefined, '4')).toBe(5);
  });

  it('prefers the explicit query over the header', () => {
    expect(resolveFromSequence('2', '9')).toBe(2);
  });

  it('rejects malformed values', () => {
    expect(() => resolveFromSequence('-1', undefined)).toThrow(InvalidInputError);
    expect(() => resolveFromSequence('abc', undefined)).toThrow('from must be a non-negative integer, got: abc');
    expect(() => resolveFromSequence(['1', '2'], undefined)).toThrow('from must be a single value');
    expect(() => resolveFromSequence(undefined, 'x')).toThrow('Last-Event-ID must be a non-negative integer, got: x');
  });
});
