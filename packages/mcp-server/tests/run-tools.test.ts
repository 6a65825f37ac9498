import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { z } from 'zod';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import type { MarketIntelService } from '@market-intel/agents';
import { createMcpServer } from '../src/server.js';
import {
  collect, createFakeAgents, createTestService, SAMPLE_STRATEGY, type FakeAgents,
} from '../../agents/tests/helpers/fake-stages.js';

const TextResult = z.object({
  content: z.array(z.object({ type: z.literal('text'), text: z.string() })),
  isError: z.boolean().optional(),
});

describe('market intel MCP tools', () => {
  let agents: FakeAgents;
  let service: MarketIntelService;
  let client: Client;

  beforeEach(async () => {
    agents = createFakeAgents();
    service = createTestService(agents);
    const server = createMcpServer(service, { includeVoiceDefault: false });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);
    client = new Client({ name: 'test-client', version: '0.0.0' });
    await client.connect(clientTransport);
  });

  afterEach(async () => {
    await client.close();
  });

  async function call(name: string, args: Record<string, unknown> = {}) {
    const result = TextResult.parse(await client.callTool({ name, arguments: args }));
    return { isError: result.isError ?? false, body: JSON.parse(result.content[0].text) };
  }

  it('lists the run tools', async () => {
    const { tools } = await client.listTools();

    expect(tools.map(t => t.name).sort()).toEqual([
      'market_intel_get_run',
      'market_intel_list_runs',
      'market_intel_poll',
      'market_intel_submit',
    ]);
  });

  it('submits a run and polls it to its report', async () => {
    const submitted = await call('market_intel_submit', { topic: 'AI hardware market' });
    expect(submitted.isError).toBe(false);
    const runId: string = submitted.body.run_id;

    await collect(service.subscribe(runId));
    const polled = await call('market_intel_poll', { run_id: runId });

    expect(polled.isError).toBe(false);
    expect(polled.body.run_id).toBe(runId);
    expect(polled.body.status).toBe('succeeded');
    expect(polled.body.events).toHaveLength(10);
    expect(polled.body.events[0]).toEqual({
      sequence: 0,
      text: "🚀 Pipeline started for topic: 'AI hardware market'",
      isError: false,
    });
    expect(polled.body.next_sequence).toBe(10);
    expect(polled.body.report.strategy).toEqual(SAMPLE_STRATEGY);
    expect(polled.body.error).toBeUndefined();
    expect(agents.voice.run).not.toHaveBeenCalled();
  });

  it('continues from from_sequence', async () => {
    const { body } = await call('market_intel_submit', { topic: 'AI hardware market', include_voice: true });
    await collect(service.subscribe(body.run_id));

    const polled = await call('market_intel_poll', { run_id: body.run_id, from_sequence: 11 });

    expect(polled.body.events).toEqual([{ sequence: 11, text: '✅ Pipeline complete.', isError: false }]);
    expect(polled.body.next_sequence).toBe(12);
  });

  it('reports a failed run through poll', async () => {
    agents.data.run.mockRejectedValueOnce(new Error('search quota exhausted'));
    const { body } = await call('market_intel_submit', { topic: 'AI hardware market' });
    await collect(service.subscribe(body.run_id));

    const polled = await call('market_intel_poll', { run_id: body.run_id });

    expect(polled.isError).toBe(false);
    expect(polled.body.status).toBe('failed');
    expect(polled.body.report).toBeUndefined();
    expect(polled.body.error).toEqual({
      kind: 'StageFailure',
      message: 'Data Agent failed: search quota exhausted',
      stage: 'articles',
    });
  });

  it('returns an error result for an empty topic', async () => {
    const result = await call('market_intel_submit', { topic: '   ' });

    expect(result.isError).toBe(true);
    expect(result.body.kind).toBe('InvalidInput');
  });

  it('returns an error result for an unknown run', async () => {
    const result = await call('market_intel_poll', { run_id: 'missing' });

    expect(result).toEqual({
      isError: true,
      body: { error: 'Unknown run_id: missing', kind: 'NotFound' },
    });
  });

  it('lists submitted runs', async () => {
    const { body } = await call('market_intel_submit', { topic: 'AI hardware market' });
    await collect(service.subscribe(body.run_id));

    const listed = await call('market_intel_list_runs');

    expect(listed.body.runs).toHaveLength(1);
    expect(listed.body.runs[0].runId).toBe(body.run_id);
  });
});
