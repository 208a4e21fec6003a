import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { LedgerError } from "@/utils/errors";

/**
 * Run a tool and wrap its value as JSON text. Ledger errors become error
 * results carrying their code; anything else propagates to the server.
 */
export async function respond(run: () => Promise<unknown>): Promise<CallToolResult> {
  try {
    const value = await run();
    return {
      content: [{ type: "text", text: JSON.stringify(value, null, 2) }],
    };
  } catch (error) {
    if (error instanceof LedgerError) {
      return {
        isError: true,
        content: [
          {
            type: "text",
            text: JSON.stringify({ code: error.code, message: error.message }, null, 2),
          },
        ],
      };
    }
    throw error;
  }
}
