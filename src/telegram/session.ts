import type { TelegramCredentials } from "../app/config.js";
import { loadGramJs, type TelegramModule } from "./client-context.js";

export interface LoginPrompts {
  phoneNumber: () => Promise<string>;
  phoneCode: () => Promise<string>;
  password: () => Promise<string>;
  onError?: (error: Error) => void;
}

export interface GenerateSessionOptions {
  credentials: TelegramCredentials;
  prompts: LoginPrompts;
  connectionRetries?: number;
  loadModule?: () => Promise<TelegramModule>;
}

/**
 * Interactive login against an empty string session. The returned string is
 * what TELEGRAM_SESSION_STRING expects.
 */
export async function generateSessionString(
  options: GenerateSessionOptions,
): Promise<string> {
  const gram = await (options.loadModule ?? loadGramJs)();
  const session = new gram.sessions.StringSession("");
  const client = new gram.TelegramClient(
    session,
    options.credentials.apiId,
    options.credentials.apiHash,
    { connectionRetries: options.connectionRetries ?? 5 },
  );

  try {
    await client.start({
      phoneNumber: options.prompts.phoneNumber,
      phoneCode: options.prompts.phoneCode,
      password: options.prompts.password,
      onError: (error) => {
        options.prompts.onError?.(error);
      },
    });
    return session.save();
  } finally {
    await client.destroy();
  }
}
