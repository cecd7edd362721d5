import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import * as z from "zod/v4";
import type { AppContainer } from "../../app/container.js";
import { READ_ONLY, WRITES, entityInputSchema, runTool } from "../tooling.js";

export function registerProfileTools(server: McpServer, container: AppContainer): void {
  const profile = container.profileService;

  server.registerTool(
    "get_me",
    {
      description: "Get the account this server is logged in as",
      inputSchema: {},
      annotations: READ_ONLY,
    },
    async () => runTool(container, "get_me", () => profile.getMe()),
  );

  server.registerTool(
    "update_profile",
    {
      description: "Update first name, last name or bio of the account",
      inputSchema: {
        firstName: z.string().min(1).max(64).optional(),
        lastName: z.string().max(64).optional(),
        about: z.string().max(70).optional(),
      },
      annotations: WRITES,
    },
    async (args) => runTool(container, "update_profile", () => profile.updateProfile(args)),
  );

  server.registerTool(
    "get_user_status",
    {
      description: "Get the online status of a user",
      inputSchema: { userId: entityInputSchema },
      annotations: READ_ONLY,
    },
    async (args) => runTool(container, "get_user_status", () => profile.getUserStatus(args)),
  );
}
