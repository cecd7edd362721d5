import { once } from "node:events";
import { PassThrough } from "node:stream";
import { describe, expect, test } from "vitest";
import { runStdioTransport } from "../../src/transports/stdio/run.js";
import { testContainer } from "../support/fixtures.js";

describe("stdio transport", () => {
  test("answers JSON-RPC on the given streams", async () => {
    const stdin = new PassThrough();
    const stdout = new PassThrough();
    const handle = await runStdioTransport(testContainer(), { stdin, stdout });

    try {
      const reply = once(stdout, "data");
      stdin.write(`${JSON.stringify({ jsonrpc: "2.0", id: 1, method: "ping" })}\n`);
      const [chunk] = await reply;

      expect(JSON.parse(String(chunk))).toEqual({ jsonrpc: "2.0", id: 1, result: {} });
    } finally {
      await handle.close();
    }
  });

  test("sends console.log to stderr only while running", async () => {
    const originalLog = console.log;
    const handle = await runStdioTransport(testContainer(), {
      stdin: new PassThrough(),
      stdout: new PassThrough(),
    });

    expect(console.log).toBe(console.error);

    await handle.close();
    expect(console.log).toBe(originalLog);
  });
});
