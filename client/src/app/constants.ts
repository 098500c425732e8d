export const DEFAULT_SERVER_URL = "wss://mc.chenk.my.id:3000/ws/anagram/1";

export const APP_WIDTH = 56;
export const CHAT_MESSAGES_MAX = 12;
export const KEEPALIVE_INTERVAL_MS = 10_000;
export const COUNTDOWN_TICK_MS = 100;

export const EXIT_COMMAND = "/exit";
export const CLEAR_COMMAND = "/clear";
export const MANUAL_PING_MESSAGE = "don't ping manually! this is handled automatically by the client";

export const INPUT_PLACEHOLDER_CONNECTING = "connecting...";
export const INPUT_PLACEHOLDER_READY = "message/answer here, send with Enter";
export const INPUT_PLACEHOLDER_OFFLINE = "not connected";

export const GUIDE_AWAITING_START = "WAITING ROUND START!";
export const GUIDE_ACTIVE = "PLEASE GUESS!";
export const GUIDE_REVEALED = "TIME'S UP! THE ANSWER:";
