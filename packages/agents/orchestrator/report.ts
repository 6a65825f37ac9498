// Report assembly from accumulated stage outputs

import type { Report } from '../types/report.js';
import type { StageOutputStore } from './pipeline.js';

/**
 * Build the terminal report. Mandatory outputs must be present;
 * voiceScript is included only when the voice stage committed one.
 */
export function assembleReport(topic: string, outputs: StageOutputStore, now = new Date()): Report {
  const voiceScript = outputs.peek('voiceScript');
  return {
    topic,
    articles: outputs.require('articles'),
    trends: outputs.require('trends'),
    strategy: outputs.require('strategy'),
    risks: outputs.require('risks'),
    ...(voiceScript !== undefined ? { voiceScript } : {}),
    generatedAt: now.toISOString(),
  };
}
