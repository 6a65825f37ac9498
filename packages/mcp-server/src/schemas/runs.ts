import { z } from "zod";

export const SubmitRunSchema = z.object({
  topic: z.string().describe("Market or industry topic to analyse, e.g. 'AI hardware market'"),
  include_voice: z
    .boolean()
    .optional()
    .describe("Also write a 60-second broadcast script (default true)"),
});

export const PollRunSchema = z.object({
  run_id: z.string().describe("Run id returned by market_intel_submit"),
  from_sequence: z.coerce
    .number()
    .int()
    .min(0)
    .optional()
    .describe("First log sequence to return; pass the previous next_sequence to continue"),
});

export const GetRunSchema = z.object({
  run_id: z.string().describe("Run id returned by market_intel_submit"),
});
