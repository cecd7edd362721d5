import type { Readable, Writable } from "node:stream";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { AppContainer } from "../../app/container.js";
import { buildMcpServer } from "../../mcp/server.js";

export interface StdioHandle {
  close(): Promise<void>;
}

/** Defaults to the process streams. */
export interface StdioStreams {
  stdin?: Readable;
  stdout?: Writable;
}

export async function runStdioTransport(
  container: AppContainer,
  streams: StdioStreams = {},
): Promise<StdioHandle> {
  // The Telegram client prints through console.log; stdout must carry JSON-RPC only.
  const originalLog = console.log;
  console.log = console.error;

  const server = buildMcpServer(container);
  const transport = new StdioServerTransport(streams.stdin, streams.stdout);
  await server.connect(transport);
  container.logger.info("telegram-mcp stdio transport started");

  return {
    close: async () => {
      try {
        await server.close();
      } finally {
        console.log = originalLog;
      }
    },
  };
}
