import type { TelegramClientContext } from "../client-context.js";
import type { EntityResolver, TelegramEntityInput } from "../entity-resolver.js";
import { operationError } from "../errors.js";
import { formatUser, formatUserStatus } from "../format.js";

export class ProfileService {
  constructor(
    private readonly context: TelegramClientContext,
    private readonly resolver: EntityResolver,
  ) {}

  async getMe() {
    return this.context.withClient("profile", "get_me", async ({ client, gram }) => {
      const me = await client.getMe();
      if (!(me instanceof gram.Api.User)) {
        throw operationError("invalid_session", "Telegram did not return the current user");
      }
      return formatUser(me);
    });
  }

  async updateProfile(input: { firstName?: string; lastName?: string; about?: string }) {
    return this.context.withClient("profile", "update_profile", async ({ client, gram }) => {
      const updated = await client.invoke(
        new gram.Api.account.UpdateProfile({
          firstName: input.firstName,
          lastName: input.lastName,
          about: input.about,
        }),
      );
      return { ok: true, me: formatUser(updated) };
    });
  }

  async getUserStatus(input: { userId: TelegramEntityInput }) {
    return this.context.withClient("profile", "get_user_status", async ({ client, gram }) => {
      const user = await this.resolver.resolveEntity(client, input.userId);
      if (!(user instanceof gram.Api.User)) {
        throw operationError("invalid_input", "Status is only available for users");
      }
      return {
        user: formatUser(user),
        ...formatUserStatus(user.status),
      };
    });
  }
}
