import { ZodError } from 'zod';
import { LedgerValidationError } from '../errors.js';

export interface ToolResponse {
  [key: string]: unknown;
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
}

/**
 * Strings pass through as text; anything else is rendered as indented JSON.
 * Errors become tool errors carrying `{ error, type }`.
 */
export function wrapResponse(result: unknown): ToolResponse {
  if (result instanceof Error) {
    return {
      content: [{ type: 'text', text: JSON.stringify({ error: result.message, type: result.name }) }],
      isError: true,
    };
  }
  const text = typeof result === 'string' ? result : JSON.stringify(result, null, 2);
  return { content: [{ type: 'text', text }] };
}

/**
 * Run a tool body and turn its failure into a tool error. Validation failures are
 * expected; anything else is also logged to stderr.
 */
export async function toolCall(body: () => Promise<unknown>): Promise<ToolResponse> {
  try {
    return wrapResponse(await body());
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    if (!(error instanceof LedgerValidationError) && !(error instanceof ZodError)) {
      console.error(`[tools] ${error.name}: ${error.message}`);
    }
    return wrapResponse(error);
  }
}
