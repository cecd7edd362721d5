import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { AppContainer } from "../app/container.js";
import { registerChatTools } from "./tools/chats.js";
import { registerContactTools } from "./tools/contacts.js";
import { registerMessageTools } from "./tools/messages.js";
import { registerProfileTools } from "./tools/profile.js";
import { registerSearchTools } from "./tools/search.js";

export function buildMcpServer(container: AppContainer): McpServer {
  const server = new McpServer(
    {
      name: container.config.server.name,
      version: container.config.server.version,
    },
    { capabilities: { logging: {}, tools: {} } },
  );

  registerChatTools(server, container);
  registerMessageTools(server, container);
  registerContactTools(server, container);
  registerProfileTools(server, container);
  registerSearchTools(server, container);

  return server;
}
