// Pipeline definition — an ordered, frozen list of stages shared by every run
//
// Stages declare which prior outputs they read. A stage can only `get` the
// outputs it lists in `inputs`, and createPipeline() rejects forward
// references at configuration time.

import type { StageName, StageOutputs } from '../types/report.js';
import { PipelineDefinitionError, RunStateError } from '../types/errors.js';

// ── Stage contract ──────────────────────────────────────────────────

export interface StageContext {
  readonly runId: string;
  readonly topic: string;
  readonly includeVoice: boolean;
  /** Aborted when the stage times out */
  readonly signal: AbortSignal;
  /** Append a progress line to the run log (dropped after timeout) */
  log(text: string): void;
}

export interface StageInput<I extends StageName> {
  readonly topic: string;
  get<K extends I>(name: K): StageOutputs[K];
}

export interface StageDescriptor<K extends StageName, I extends StageName> {
  name: K;
  /** Human-readable agent label, e.g. "Trend Agent" */
  label: string;
  /** Log line appended when the stage begins */
  announce: string;
  inputs: readonly I[];
  /** Optional stages degrade the report instead of failing the run */
  optional?: boolean;
  enabled?: (run: { includeVoice: boolean }) => boolean;
  invoke(input: StageInput<I>, ctx: StageContext): Promise<StageOutputs[K]>;
  summarize?(output: StageOutputs[K]): string;
}

export interface StageCompletion {
  readonly summary: string;
  /** Record the output; called only if the stage finished in time */
  commit(): void;
}

export interface PipelineStage {
  readonly name: StageName;
  readonly label: string;
  readonly announce: string;
  readonly inputs: readonly StageName[];
  readonly optional: boolean;
  isEnabled(run: { includeVoice: boolean }): boolean;
  execute(outputs: StageOutputStore, ctx: StageContext): Promise<StageCompletion>;
}

export interface Pipeline {
  readonly stages: readonly PipelineStage[];
}

// ── Output accumulator (one per run) ────────────────────────────────

export class StageOutputStore {
  private values: Partial<StageOutputs> = {};

  set<K extends StageName>(name: K, value: StageOutputs[K]): void {
    this.values[name] = value;
  }

  peek<K extends StageName>(name: K): StageOutputs[K] | undefined {
    return this.values[name];
  }

  require<K extends StageName>(name: K): StageOutputs[K] {
    const value = this.peek(name);
    if (value === undefined) {
      throw new RunStateError(`Stage output "${name}" is not available`);
    }
    return value;
  }

  /** Restrict access to the declared inputs of one stage */
  view<I extends StageName>(names: readonly I[], topic: string): StageInput<I> {
    return {
      topic,
      get: <K extends I>(name: K): StageOutputs[K] => {
        if (!names.includes(name)) {
          throw new RunStateError(`Stage input "${name}" was not declared`);
        }
        return this.require(name);
      },
    };
  }
}

// ── Builders ────────────────────────────────────────────────────────

export function defineStage<K extends StageName, I extends StageName = never>(
  desc: StageDescriptor<K, I>,
): PipelineStage {
  const inputs: readonly I[] = Object.freeze([...desc.inputs]);
  return Object.freeze({
    name: desc.name,
    label: desc.label,
    announce: desc.announce,
    inputs,
    optional: desc.optional ?? false,
    isEnabled: (run: { includeVoice: boolean }) => desc.enabled?.(run) ?? true,
    async execute(outputs: StageOutputStore, ctx: StageContext): Promise<StageCompletion> {
      const output = await desc.invoke(outputs.view(inputs, ctx.topic), ctx);
      return {
        summary: desc.summarize ? desc.summarize(output) : `[${desc.label}] Done.`,
        commit: () => outputs.set(desc.name, output),
      };
    },
  });
}

/**
 * Validate and freeze a pipeline. Throws PipelineDefinitionError on:
 * duplicate names, inputs that do not name an earlier stage, and mandatory
 * stages reading an optional stage's output.
 */
export function createPipeline(stages: readonly PipelineStage[]): Pipeline {
  if (stages.length === 0) {
    throw new PipelineDefinitionError('Pipeline must contain at least one stage');
  }

  const seen = new Map<StageName, PipelineStage>();
  for (const stage of stages) {
    if (seen.has(stage.name)) {
      throw new PipelineDefinitionError(`Duplicate stage name "${stage.name}"`);
    }
    for (const input of stage.inputs) {
      const producer = seen.get(input);
      if (!producer) {
        throw new PipelineDefinitionError(
          `Stage "${stage.name}" reads "${input}", which is not produced by an earlier stage`,
        );
      }
      if (producer.optional && !stage.optional) {
        throw new PipelineDefinitionError(
          `Mandatory stage "${stage.name}" cannot depend on optional stage "${input}"`,
        );
      }
    }
    seen.set(stage.name, stage);
  }

  return Object.freeze({ stages: Object.freeze([...stages]) });
}
