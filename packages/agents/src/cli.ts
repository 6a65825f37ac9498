#!/usr/bin/env node
// Market Intel — command line entry point
//
// Usage:
//   market-intel analyze "AI hardware market"            # run one pipeline, print the report
//   market-intel analyze --no-voice --json "<topic>"     # skip voice stage, print JSON
//   market-intel serve --port 8000                       # HTTP + SSE server
//   market-intel --help

import 'dotenv/config';
import { loadConfig, type MarketIntelConfig } from '../config/env.js';
import { createServiceFromConfig } from '../orchestrator/service.js';
import { renderReport } from '../utils/report-renderer.js';
import { startServer } from './server.js';

// ── ANSI helpers (no chalk dependency) ──────────────────────────────

const isTTY = process.stderr.isTTY ?? false;

const ansi = {
  reset: isTTY ? '\x1b[0m' : '',
  bold: isTTY ? '\x1b[1m' : '',
  dim: isTTY ? '\x1b[2m' : '',
  cyan: isTTY ? '\x1b[36m' : '',
  green: isTTY ? '\x1b[32m' : '',
  red: isTTY ? '\x1b[31m' : '',
};

function c(color: keyof typeof ansi, text: string): string {
  return `${ansi[color]}${text}${ansi.reset}`;
}

// ── CLI class ───────────────────────────────────────────────────────

class MarketIntelCli {
  async start(): Promise<number> {
    const rawArgs = process.argv.slice(2);

    if (rawArgs.includes('--help') || rawArgs.includes('-h') || rawArgs.length === 0) {
      this.printHelp();
      return 0;
    }

    const command = rawArgs[0];
    const rest = rawArgs.slice(1);

    switch (command) {
      case 'analyze':
        return this.handleAnalyze(rest);
      case 'serve':
        return this.handleServe(rest);
      case 'help':
        this.printHelp();
        return 0;
      default:
        console.error(`Unknown command: ${command}\n`);
        this.printHelp();
        return 1;
    }
  }

  // ── Subcommand: analyze ─────────────────────────────────────────

  private async handleAnalyze(args: string[]): Promise<number> {
    const config = loadConfig();
    let includeVoice = config.pipeline.includeVoiceDefault;
    let json = false;
    const topicParts: string[] = [];

    for (const arg of args) {
      if (arg === '--no-voice') includeVoice = false;
      else if (arg === '--voice') includeVoice = true;
      else if (arg === '--json') json = true;
      else topicParts.push(arg);
    }

    const topic = topicParts.join(' ').trim();
    if (!topic) {
      console.error('Error: No topic provided. Use "market-intel --help" for usage.\n');
      return 1;
    }

    const service = createServiceFromConfig(config);
    const runId = service.submit(topic, includeVoice);
    console.error(c('dim', `  run ${runId}`));

    for await (const event of service.subscribe(runId).events()) {
      switch (event.type) {
        case 'log':
          console.error(event.isError ? c('red', event.text) : event.text);
          break;
        case 'done':
          console.log(json ? JSON.stringify(event.report, null, 2) : renderReport(event.report));
          return 0;
        case 'error':
          console.error(`\n  ${c('red', 'Error:')} ${event.message}\n`);
          return 1;
      }
    }
    return 1;
  }

  // ── Subcommand: serve ───────────────────────────────────────────

  private async handleServe(args: string[]): Promise<number> {
    const config: MarketIntelConfig = loadConfig();
    let port = config.server.port;

    for (let i = 0; i < args.length; i++) {
      if (args[i] === '--port' && args[i + 1]) {
        const value = Number(args[++i]);
        if (!Number.isInteger(value) || value < 0) {
          console.error(`  ${c('red', 'Error:')} Invalid port "${args[i]}"\n`);
          return 1;
        }
        port = value;
      }
    }

    const service = createServiceFromConfig(config);
    const server = await startServer(service, {
      port,
      host: config.server.host,
      keepAliveMs: config.server.keepAliveMs,
      includeVoiceDefault: config.pipeline.includeVoiceDefault,
    });

    console.error(`  ${c('green', '●')} ${c('bold', 'Market Intel')} listening on ${c('cyan', `http://${config.server.host}:${port}`)}`);

    return new Promise<number>((resolve) => {
      const shutdown = () => server.close(() => resolve(0));
      process.once('SIGINT', shutdown);
      process.once('SIGTERM', shutdown);
    });
  }

  // ── Help screen ─────────────────────────────────────────────────

  printHelp(): void {
    console.log(`
  ${c('bold', 'Market Intel')} — multi-agent market intelligence reports

  ${c('bold', 'Usage:')}
    market-intel analyze [options] "<topic>"   Run the pipeline and print the report
    market-intel serve [--port <n>]            Start the HTTP + SSE server
    market-intel --help                        Show this help

  ${c('bold', 'Analyze options:')}
    --no-voice                    Skip the voice briefing stage
    --json                        Print the report as JSON

  ${c('bold', 'Environment:')}
    ANTHROPIC_API_KEY             Required for analysis stages.
    TAVILY_API_KEY                Required for news retrieval.
    MARKET_INTEL_MODEL            Model override.
    PORT, HOST                    Server bind address.

  ${c('bold', 'Examples:')}
    market-intel analyze "AI hardware market"
    market-intel analyze --no-voice --json "EV battery supply chain"
    market-intel serve --port 8080
`);
  }
}

// ── Entry point ─────────────────────────────────────────────────────

const cli = new MarketIntelCli();
cli.start().then(
  (code) => process.exit(code),
  (err) => {
    console.error(`${c('red', 'Fatal:')} ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  },
);
