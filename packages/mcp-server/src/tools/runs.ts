import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { MarketIntelService, RunPoll } from "@market-intel/agents";
import {
  SubmitRunSchema,
  PollRunSchema,
  GetRunSchema,
} from "../schemas/runs.js";
import { toolResult } from "../formatters/response.js";

function formatPoll(poll: RunPoll) {
  return {
    run_id: poll.runId,
    status: poll.status,
    events: poll.events.map((e) => ({
      sequence: e.sequence,
      text: e.text,
      isError: e.isError,
    })),
    next_sequence: poll.nextSequence,
    ...(poll.report ? { report: poll.report } : {}),
    ...(poll.error ? { error: poll.error } : {}),
  };
}

export function registerRunTools(
  server: McpServer,
  service: MarketIntelService,
  options: { includeVoiceDefault?: boolean } = {},
) {
  const includeVoiceDefault = options.includeVoiceDefault ?? true;

  server.tool(
    "market_intel_submit",
    "Start a market intelligence run for a topic. The pipeline searches recent news, detects trends, derives strategic opportunities, assesses risks and optionally writes a voice briefing. Returns a run_id immediately; use market_intel_poll to follow progress and fetch the report.",
    SubmitRunSchema.shape,
    async (params) =>
      toolResult(() => {
        const { topic, include_voice } = SubmitRunSchema.parse(params);
        return { run_id: service.submit(topic, include_voice ?? includeVoiceDefault) };
      })
  );

  server.tool(
    "market_intel_poll",
    "Read a run's progress log from from_sequence onward. Returns status, new log events and next_sequence; once the run has finished, also the report (on success) or the error (on failure).",
    PollRunSchema.shape,
    async (params) =>
      toolResult(() => {
        const { run_id, from_sequence } = PollRunSchema.parse(params);
        return formatPoll(service.poll(run_id, from_sequence ?? 0));
      })
  );

  server.tool(
    "market_intel_get_run",
    "Snapshot of one run: status, timestamps, log length, and the report or error once finished.",
    GetRunSchema.shape,
    async (params) =>
      toolResult(() => {
        const { run_id } = GetRunSchema.parse(params);
        return service.getRun(run_id);
      })
  );

  server.tool(
    "market_intel_list_runs",
    "List retained runs, newest first.",
    async () => toolResult(() => ({ runs: service.listRuns() }))
  );
}
