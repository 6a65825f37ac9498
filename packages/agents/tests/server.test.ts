// HTTP + SSE gateway tests against an in-process express server

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { Server } from 'node:http';
import { createApp, statusForError } from '../src/server.js';
import { parseSseFrames } from '../gateway/sse.js';
import type { MarketIntelService } from '../orchestrator/service.js';
import { createLogger } from '../utils/logger.js';
import type { Article } from '../types/report.js';
import {
  createFakeAgents, createTestService, deferred, SAMPLE_ARTICLES, type FakeAgents,
} from './helpers/fake-stages.js';

describe('HTTP gateway', () => {
  let agents: FakeAgents;
  let service: MarketIntelService;
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    agents = createFakeAgents();
    service = createTestService(agents);
    ({ server, baseUrl } = await listen(60_000));
  });

  afterEach(async () => {
    await close(server);
  });

  async function listen(keepAliveMs: number): Promise<{ server: Server; baseUrl: string }> {
    const app = createApp(service, {
      keepAliveMs,
      logger: createLogger('HTTP', { level: 'silent' }),
    });
    const s = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });
    const address = s.address();
    if (address === null || typeof address === 'string') throw new Error('Server has no port');
    return { server: s, baseUrl: `http://127.0.0.1:${address.port}` };
  }

  function close(s: Server): Promise<void> {
    return new Promise<void>((resolve, reject) => s.close(err => (err ? reject(err) : resolve())));
  }

  async function readJson<T>(res: Response): Promise<T> {
    return JSON.parse(await res.text());
  }

  async function submit(body: unknown): Promise<Response> {
    return fetch(`${baseUrl}/run`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });
  }

  async function submitRun(topic = 'AI hardware market', includeVoice = true): Promise<string> {
    const res = await submit({ topic, include_voice: includeVoice });
    const json = await readJson<{ run_id: string }>(res);
    return json.run_id;
  }

  describe('POST /run', () => {
    it('returns a run id', async () => {
      const res = await submit({ topic: 'AI hardware market' });

      expect(res.status).toBe(200);
      const body = await readJson<{ run_id: string }>(res);
      expect(typeof body.run_id).toBe('string');
      expect(service.getRun(body.run_id).includeVoice).toBe(true);
    });

    it('honours include_voice and includeVoice', async () => {
      const a = await submitRun('topic a', false);
      const res = await submit({ topic: 'topic b', includeVoice: false });
      const b = await readJson<{ run_id: string }>(res);

      expect(service.getRun(a).includeVoice).toBe(false);
      expect(service.getRun(b.run_id).includeVoice).toBe(false);
    });

    it('rejects an empty topic', async () => {
      const res = await submit({ topic: '   ' });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: 'topic is required' });
      expect(service.listRuns()).toEqual([]);
    });

    it('rejects a missing topic', async () => {
      const res = await submit({});

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: 'topic is required' });
    });

    it('rejects malformed JSON', async () => {
      const res = await fetch(`${baseUrl}/run`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: '{not json',
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: 'Invalid JSON body' });
    });

    it('rejects an oversized body with 413', async () => {
      const res = await submit({ topic: 'x'.repeat(20_000) });

      expect(res.status).toBe(413);
      expect(await res.json()).toEqual({ error: 'request entity too large' });
      expect(service.listRuns()).toEqual([]);
    });

    it('reads the body as JSON whatever the content type', async () => {
      const res = await fetch(`${baseUrl}/run`, {
        method: 'POST',
        headers: { 'Content-Type': 'text/plain' },
        body: JSON.stringify({ topic: 'AI hardware market', include_voice: false }),
      });

      expect(res.status).toBe(200);
      const body = await readJson<{ run_id: string }>(res);
      expect(service.getRun(body.run_id).topic).toBe('AI hardware market');
      expect(service.getRun(body.run_id).includeVoice).toBe(false);
    });
  });

  describe('GET /stream/:runId', () => {
    it('streams log events followed by one done event', async () => {
      const runId = await submitRun();

      const res = await fetch(`${baseUrl}/stream/${runId}`);
      expect(res.status).toBe(200);
      expect(res.headers.get('content-type')).toBe('text/event-stream');

      const frames = parseSseFrames(await res.text());
      const logs = frames.filter(f => f.event === 'log');
      expect(logs.map(f => f.id)).toEqual(['0', '1', '2', '3', '4', '5', '6', '7', '8', '9', '10', '11']);
      expect(JSON.parse(logs[0].data)).toEqual({
        sequence: 0,
        text: "🚀 Pipeline started for topic: 'AI hardware market'",
        isError: false,
      });

      const last = frames[frames.length - 1];
      expect(last.event).toBe('done');
      const report: { topic: string; voiceScript?: string } = JSON.parse(last.data);
      expect(report.topic).toBe('AI hardware market');
      expect(report.voiceScript).toBeTruthy();
      expect(frames.filter(f => f.event === 'done' || f.event === 'error')).toHaveLength(1);
    });

    it('streams an error event when a stage fails', async () => {
      agents.trend.run.mockRejectedValueOnce(new Error('provider unavailable'));
      const runId = await submitRun();

      const frames = parseSseFrames(await (await fetch(`${baseUrl}/stream/${runId}`)).text());
      const last = frames[frames.length - 1];

      expect(last.event).toBe('error');
      expect(JSON.parse(last.data)).toEqual({
        message: 'Trend Agent failed: provider unavailable',
        kind: 'StageFailure',
        stage: 'trends',
      });
      expect(agents.strategy.run).not.toHaveBeenCalled();
    });

    it('resumes from the from query parameter', async () => {
      const runId = await submitRun();

      const frames = parseSseFrames(await (await fetch(`${baseUrl}/stream/${runId}?from=3`)).text());

      expect(frames[0].id).toBe('3');
      expect(frames.filter(f => f.event === 'log')).toHaveLength(9);
    });

    it('resumes after Last-Event-ID', async () => {
      const runId = await submitRun();

      const res = await fetch(`${baseUrl}/stream/${runId}`, { headers: { 'Last-Event-ID': '4' } });
      const frames = parseSseFrames(await res.text());

      expect(frames[0].id).toBe('5');
    });

    it('detaches on client disconnect and lets the run finish', async () => {
      const gate = deferred<Article[]>();
      agents.data.run.mockImplementationOnce(async () => gate.promise);
      const runId = await submitRun('AI hardware market', false);
      const log = service.registry.get(runId).log;

      const controller = new AbortController();
      const res = await fetch(`${baseUrl}/stream/${runId}`, { signal: controller.signal });
      const reader = res.body?.getReader();
      if (!reader) throw new Error('Stream has no body');
      const first = await reader.read();

      expect(new TextDecoder().decode(first.value)).toContain('id: 0\nevent: log\n');
      expect(log.subscriberCount).toBe(1);

      controller.abort();
      await vi.waitFor(() => expect(log.subscriberCount).toBe(0));
      expect(service.getRun(runId).status).toBe('running');

      gate.resolve(SAMPLE_ARTICLES);
      await vi.waitFor(() => expect(service.getRun(runId).status).toBe('succeeded'));
      expect(agents.risk.run).toHaveBeenCalledTimes(1);
    });

    it('sends keepalive comments while the run is quiet', async () => {
      const quiet = await listen(20);
      const gate = deferred<Article[]>();
      agents.data.run.mockImplementationOnce(async () => gate.promise);
      const runId = await submitRun('AI hardware market', false);

      const controller = new AbortController();
      const res = await fetch(`${quiet.baseUrl}/stream/${runId}`, { signal: controller.signal });
      const reader = res.body?.getReader();
      if (!reader) throw new Error('Stream has no body');
      const decoder = new TextDecoder();
      let text = '';
      while (!text.includes(': keepalive\n\n')) {
        const chunk = await reader.read();
        if (chunk.done) break;
        text += decoder.decode(chunk.value, { stream: true });
      }

      expect(text).toContain(': keepalive\n\n');
      expect(parseSseFrames(text).map(f => f.id)).toEqual(['0', '1']);

      controller.abort();
      gate.resolve(SAMPLE_ARTICLES);
      await vi.waitFor(() => expect(service.getRun(runId).status).toBe('succeeded'));
      await close(quiet.server);
    });

    it('returns 404 for an unknown run', async () => {
      const res = await fetch(`${baseUrl}/stream/missing-id`);

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: 'Unknown run_id: missing-id' });
    });

    it('returns 400 for a malformed from', async () => {
      const runId = await submitRun();
      const res = await fetch(`${baseUrl}/stream/${runId}?from=abc`);

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: 'from must be a non-negative integer, got: abc' });
    });
  });

  describe('run inspection', () => {
    it('lists runs and returns a snapshot', async () => {
      const runId = await submitRun('AI hardware market', false);
      await (await fetch(`${baseUrl}/stream/${runId}`)).text();

      const list = await readJson<{ runs: Array<{ runId: string; status: string }> }>(await fetch(`${baseUrl}/runs`));
      expect(list.runs.map(r => [r.runId, r.status])).toEqual([[runId, 'succeeded']]);

      const snapshot = await readJson<{ status: string; logLength: number }>(await fetch(`${baseUrl}/runs/${runId}`));
      expect(snapshot).toMatchObject({ status: 'succeeded', logLength: 10, logClosed: true });
    });

    it('returns 404 for an unknown run snapshot', async () => {
      const res = await fetch(`${baseUrl}/runs/missing-id`);
      expect(res.status).toBe(404);
    });

    it('reports health', async () => {
      await submitRun();
      const res = await fetch(`${baseUrl}/health`);
      expect(await res.json()).toEqual({ status: 'ok', runs: 1 });
    });
  });
});

describe('statusForError', () => {
  it('keeps a 4xx status carried by the error', () => {
    expect(statusForError(Object.assign(new Error('unsupported charset "LATIN-9"'), { status: 415 }))).toBe(415);
    expect(statusForError(Object.assign(new Error('request aborted'), { status: 400 }))).toBe(400);
  });

  it('maps everything else to 500', () => {
    expect(statusForError(Object.assign(new Error('upstream down'), { status: 503 }))).toBe(500);
    expect(statusForError(new Error('boom'))).toBe(500);
    expect(statusForError('boom')).toBe(500);
  });
});
