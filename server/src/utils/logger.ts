/**
 * Logger utility — tagged console logging so server output can be grepped by area.
 *
 * Usage:
 *   import { log } from "../utils/logger";
 *   log.chat("Session started", { sessionId });
 *   log.geometry("Template scene built");
 *   log.error("plan", "Gemini call failed", err);
 */

export type Tag = "server" | "db" | "chat" | "plan" | "geometry" | "rate";

function fmt(tag: Tag, msg: string): string {
  const ts = new Date().toISOString().slice(11, 23); // HH:mm:ss.sss
  return `[${ts}][${tag.toUpperCase()}] ${msg}`;
}

function info(tag: Tag, msg: string, data?: unknown): void {
  if (data !== undefined) {
    console.log(fmt(tag, msg), data);
  } else {
    console.log(fmt(tag, msg));
  }
}

function warn(tag: Tag, msg: string, data?: unknown): void {
  if (data !== undefined) {
    console.warn(fmt(tag, msg), data);
  } else {
    console.warn(fmt(tag, msg));
  }
}

function error(tag: Tag, msg: string, err?: unknown): void {
  const errMsg = err instanceof Error ? err.message : String(err ?? "");
  console.error(fmt(tag, `${msg}${errMsg ? ": " + errMsg : ""}`));
}

export const log = {
  server: (msg: string, data?: unknown) => info("server", msg, data),
  db: (msg: string, data?: unknown) => info("db", msg, data),
  chat: (msg: string, data?: unknown) => info("chat", msg, data),
  plan: (msg: string, data?: unknown) => info("plan", msg, data),
  geometry: (msg: string, data?: unknown) => info("geometry", msg, data),
  rate: (msg: string, data?: unknown) => info("rate", msg, data),
  warn: (tag: Tag, msg: string, data?: unknown) => warn(tag, msg, data),
  error: (tag: Tag, msg: string, err?: unknown) => error(tag, msg, err),
};
