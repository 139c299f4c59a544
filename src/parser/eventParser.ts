import { validateEvent, verifyEvent } from "nostr-tools";
import type { Event as NostrEvent } from "nostr-tools";
import type { ProfileMetadata } from "../types.js";

export interface ParseOptions {
  verify: boolean;
}

const PROFILE_FIELDS = ["name", "display_name", "about", "picture", "banner", "nip05", "website"] as const;

export function getTagValue(tags: string[][], name: string): string | undefined {
  const tag = tags.find((t) => t[0] === name && t[1]);
  return tag?.[1];
}

export function getAllTagValues(tags: string[][], name: string): string[] {
  return tags.filter((t) => t[0] === name && t[1]).map((t) => t[1]);
}

function readString(value: unknown, key: string): string | undefined {
  if (typeof value !== "object" || value === null || !(key in value)) return undefined;
  const field: unknown = Reflect.get(value, key);
  return typeof field === "string" ? field : undefined;
}

export function parseEvent(raw: string, options: ParseOptions): NostrEvent {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new Error("Event input is not valid JSON");
  }

  if (!validateEvent(parsed)) {
    throw new Error("Event input is not a well-formed Nostr event");
  }
  const id = readString(parsed, "id");
  const sig = readString(parsed, "sig");
  if (!id || !sig) {
    throw new Error("Event input is missing its id or signature");
  }

  const event: NostrEvent = {
    id,
    sig,
    pubkey: parsed.pubkey,
    kind: parsed.kind,
    created_at: parsed.created_at,
    tags: parsed.tags,
    content: parsed.content
  };

  if (options.verify && !verifyEvent(event)) {
    throw new Error(`Event ${id} has an invalid signature`);
  }
  return event;
}

export function parseProfileMetadata(content: string): ProfileMetadata {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    return {};
  }

  const profile: ProfileMetadata = {};
  for (const field of PROFILE_FIELDS) {
    const value = readString(parsed, field);
    if (value) profile[field] = value;
  }
  return profile;
}
