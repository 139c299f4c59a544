import type { Event as NostrEvent } from "nostr-tools";
import type { ClientLink } from "../types.js";

type EventRef = Pick<NostrEvent, "id" | "pubkey">;

function nativeClient(code: string): ClientLink {
  return { name: "native client", url: "nostr:" + code };
}

function threadClients(code: string, event: EventRef): ClientLink[] {
  return [
    nativeClient(code),
    { name: "Snort", url: "https://Snort.social/e/" + code },
    { name: "Coracle", url: "https://coracle.social/" + code },
    { name: "Satellite", url: "https://satellite.earth/thread/" + event.id },
    { name: "Iris", url: "https://iris.to/" + code },
    { name: "Yosup", url: "https://yosup.app/thread/" + event.id },
    { name: "Nostr.band", url: "https://nostr.band/" + code },
    { name: "Primal", url: "https://primal.net/thread/" + event.id },
    { name: "Nostribe", url: "https://www.nostribe.com/post/" + event.id },
    { name: "Nostrid", url: "https://web.nostrid.app/note/" + event.id }
  ];
}

function profileClients(code: string, event: EventRef): ClientLink[] {
  return [
    nativeClient(code),
    { name: "Snort", url: "https://snort.social/p/" + code },
    { name: "Coracle", url: "https://coracle.social/" + code },
    { name: "Satellite", url: "https://satellite.earth/@" + code },
    { name: "Iris", url: "https://iris.to/" + code },
    { name: "Yosup", url: "https://yosup.app/profile/" + event.pubkey },
    { name: "Nostr.band", url: "https://nostr.band/" + code },
    { name: "Primal", url: "https://primal.net/profile/" + event.pubkey },
    { name: "Nostribe", url: "https://www.nostribe.com/profile/" + event.pubkey },
    { name: "Nostrid", url: "https://web.nostrid.app/account/" + event.pubkey }
  ];
}

function articleClients(code: string): ClientLink[] {
  return [
    nativeClient(code),
    { name: "habla", url: "https://habla.news/a/" + code },
    { name: "blogstack", url: "https://blogstack.io/" + code }
  ];
}

/**
 * Links for opening `code` in third-party clients. The native `nostr:` link is
 * always first; codes with an unrecognized prefix get only that link.
 */
export function generateClientList(code: string, event: EventRef): ClientLink[] {
  if (code.startsWith("nevent") || code.startsWith("note")) {
    return threadClients(code, event);
  }
  if (code.startsWith("npub") || code.startsWith("nprofile")) {
    return profileClients(code, event);
  }
  if (code.startsWith("naddr")) {
    return articleClients(code);
  }
  return [nativeClient(code)];
}
