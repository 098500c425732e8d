import { APP_WIDTH, CHAT_MESSAGES_MAX, DEFAULT_SERVER_URL } from "./constants.js";

export type ClientConfig = Readonly<{
  serverUrl: string;
  width: number;
  chatHeight: number;
  colors: Readonly<{
    banner: string;
    bannerText: string;
    chatBorder: string;
    error: string;
    hint: string;
  }>;
}>;

/**
 * The first positional argument overrides the default server URL. Anything
 * after it is ignored.
 */
export function resolveServerUrl(args: readonly string[]): string {
  const candidate = args[0]?.trim();
  return candidate ? candidate : DEFAULT_SERVER_URL;
}

export function createClientConfig(args: readonly string[]): ClientConfig {
  return Object.freeze({
    serverUrl: resolveServerUrl(args),
    width: APP_WIDTH,
    chatHeight: CHAT_MESSAGES_MAX,
    colors: Object.freeze({
      banner: "#005fd7",
      bannerText: "#eeeeee",
      chatBorder: "#5f87d7",
      error: "red",
      hint: "gray"
    })
  });
}
