import type { PreviewStyle, RequestHeaders } from "../types.js";

const BOT_SIGNATURES: ReadonlyArray<readonly [string, PreviewStyle]> = [
  ["telegrambot", "telegram"],
  ["twitterbot", "twitter"],
  ["mattermost", "mattermost"],
  ["slack", "slack"],
  ["discord", "discord"],
  ["whatsapp", "whatsapp"]
];

export function readHeader(headers: RequestHeaders, name: string): string {
  if (headers instanceof Headers) {
    return headers.get(name) ?? "";
  }
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() !== wanted || value === undefined) continue;
    return Array.isArray(value) ? value.join(", ") : value;
  }
  return "";
}

/**
 * Picks the rendering profile a link-preview crawler expects. An empty string
 * means a plain HTML preview for browsers.
 */
export function getPreviewStyle(headers: RequestHeaders): PreviewStyle {
  const ua = readHeader(headers, "User-Agent").toLowerCase();
  const accept = readHeader(headers, "Accept");

  for (const [signature, style] of BOT_SIGNATURES) {
    if (ua.includes(signature)) return style;
  }
  if (accept.includes("text/html")) return "";
  return "unknown";
}
