import type { Api } from "telegram";
import type {
  GramJsModule,
  TelegramClientContext,
  TelegramClientLike,
} from "../client-context.js";
import type { EntityResolver, TelegramEntityInput } from "../entity-resolver.js";
import { formatDialog, formatUser, matchesContactQuery, toId } from "../format.js";

export class ContactsService {
  constructor(
    private readonly context: TelegramClientContext,
    private readonly resolver: EntityResolver,
  ) {}

  async listContacts() {
    return this.context.withClient("contacts", "list_contacts", async ({ client, gram }) => {
      const contacts = await this.fetchContacts(client, gram);
      return {
        count: contacts.length,
        contacts: contacts.map((contact) => formatUser(contact)),
      };
    });
  }

  async searchContacts(input: { query: string }) {
    return this.context.withClient("contacts", "search_contacts", async ({ client, gram }) => {
      const contacts = await this.fetchContacts(client, gram);
      const filtered = contacts.filter((contact) => matchesContactQuery(contact, input.query));
      return {
        count: filtered.length,
        contacts: filtered.map((contact) => formatUser(contact)),
      };
    });
  }

  async addContact(input: { phone: string; firstName: string; lastName?: string }) {
    return this.context.withClient("contacts", "add_contact", async ({ client, gram }) => {
      const imported = await client.invoke(
        new gram.Api.contacts.ImportContacts({
          contacts: [
            new gram.Api.InputPhoneContact({
              clientId: gram.helpers.returnBigInt(Date.now()),
              phone: input.phone,
              firstName: input.firstName,
              lastName: input.lastName ?? "",
            }),
          ],
        }),
      );
      return {
        ok: imported.imported.length > 0,
        users: imported.users.map((user) => formatUser(user)),
      };
    });
  }

  async deleteContact(input: { userId: TelegramEntityInput }) {
    return this.context.withClient("contacts", "delete_contact", async ({ client, gram }) => {
      const user = await this.resolver.resolveEntity(client, input.userId);
      await client.invoke(new gram.Api.contacts.DeleteContacts({ id: [user] }));
      return { ok: true, userId: toId(user.id) };
    });
  }

  async blockUser(input: { userId: TelegramEntityInput }) {
    return this.context.withClient("contacts", "block_user", async ({ client, gram }) => {
      const user = await this.resolver.resolveEntity(client, input.userId);
      const ok = await client.invoke(new gram.Api.contacts.Block({ id: user }));
      return { ok, userId: toId(user.id) };
    });
  }

  async unblockUser(input: { userId: TelegramEntityInput }) {
    return this.context.withClient("contacts", "unblock_user", async ({ client, gram }) => {
      const user = await this.resolver.resolveEntity(client, input.userId);
      const ok = await client.invoke(new gram.Api.contacts.Unblock({ id: user }));
      return { ok, userId: toId(user.id) };
    });
  }

  async getDirectChatByContact(input: { contactQuery: string }) {
    return this.context.withClient(
      "contacts",
      "get_direct_chat_by_contact",
      async ({ client, gram }) => {
        const contacts = await this.fetchContacts(client, gram);
        const match = contacts.find((contact) => matchesContactQuery(contact, input.contactQuery));
        if (!match) {
          return { found: false, contact: null, chat: null };
        }
        const dialogs = await client.getDialogs({ limit: 400 });
        const contactId = toId(match.id);
        const dialog = dialogs.find((candidate) => toId(candidate.entity?.id) === contactId);
        return {
          found: true,
          contact: formatUser(match),
          chat: dialog ? formatDialog(dialog) : null,
        };
      },
    );
  }

  private async fetchContacts(client: TelegramClientLike, gram: GramJsModule) {
    const result = await client.invoke(
      new gram.Api.contacts.GetContacts({
        hash: gram.helpers.returnBigInt(0),
      }),
    );
    if (!(result instanceof gram.Api.contacts.Contacts)) {
      return [];
    }
    return result.users.filter(
      (user): user is Api.User => user instanceof gram.Api.User,
    );
  }
}
