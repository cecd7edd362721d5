import type pino from "pino";
import type { AppConfig } from "./config.js";
import { createMetrics, type AppMetrics } from "./logger.js";
import {
  TelegramClientContext,
  loadGramJs,
  type GramJsModule,
} from "../telegram/client-context.js";
import { EntityResolver } from "../telegram/entity-resolver.js";
import { ChatsService } from "../telegram/services/chats.service.js";
import { ContactsService } from "../telegram/services/contacts.service.js";
import { MessagesService } from "../telegram/services/messages.service.js";
import { ProfileService } from "../telegram/services/profile.service.js";
import { SearchService } from "../telegram/services/search.service.js";

export interface AppContainer {
  config: AppConfig;
  logger: pino.Logger;
  metrics: AppMetrics | null;
  telegram: TelegramClientContext;
  chatsService: ChatsService;
  messagesService: MessagesService;
  contactsService: ContactsService;
  profileService: ProfileService;
  searchService: SearchService;
}

export interface ContainerOptions {
  loadModule?: () => Promise<GramJsModule>;
}

export function createContainer(
  config: AppConfig,
  logger: pino.Logger,
  options: ContainerOptions = {},
): AppContainer {
  const metrics = createMetrics(config.observability.metricsEnabled);
  const telegram = new TelegramClientContext(
    config,
    logger.child({ component: "telegram" }),
    metrics,
    options.loadModule ?? loadGramJs,
  );
  const resolver = new EntityResolver();

  return {
    config,
    logger,
    metrics,
    telegram,
    chatsService: new ChatsService(telegram, resolver),
    messagesService: new MessagesService(telegram, resolver),
    contactsService: new ContactsService(telegram, resolver),
    profileService: new ProfileService(telegram, resolver),
    searchService: new SearchService(telegram, resolver),
  };
}
