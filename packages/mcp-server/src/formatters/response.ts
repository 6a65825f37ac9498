import { MarketIntelError } from "@market-intel/agents";

export function wrapResponse(result: unknown) {
  if (result instanceof Error) {
    return {
      content: [
        {
          type: "text" as const,
          text: JSON.stringify({
            error: result.message,
            ...(result instanceof MarketIntelError ? { kind: result.kind } : {}),
          }),
        },
      ],
      isError: true,
    };
  }
  return {
    content: [{ type: "text" as const, text: JSON.stringify(result) }],
  };
}

/** Wrap a throwing call so failures become MCP error results */
export function toolResult(fn: () => unknown) {
  try {
    return wrapResponse(fn());
  } catch (err) {
    return wrapResponse(err instanceof Error ? err : new Error(String(err)));
  }
}
