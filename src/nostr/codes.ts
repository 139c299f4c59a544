import { nip19 } from "nostr-tools";
import type { Event as NostrEvent } from "nostr-tools";

export function isAddressableKind(kind: number): boolean {
  return kind >= 30000 && kind < 40000;
}

export function entityCodeFor(event: NostrEvent): string {
  if (event.kind === 0) {
    return nip19.npubEncode(event.pubkey);
  }

  // An empty d tag is still a valid identifier.
  const identifier = event.tags.find((t) => t[0] === "d")?.[1];
  if (isAddressableKind(event.kind) && identifier !== undefined) {
    return nip19.naddrEncode({ identifier, pubkey: event.pubkey, kind: event.kind });
  }

  return nip19.neventEncode({ id: event.id, author: event.pubkey, kind: event.kind });
}
