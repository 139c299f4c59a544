import { describe, expect, it } from "vitest";
import { generateClientList } from "./clientList.js";

const event = { id: "abc", pubkey: "def" };

describe("generateClientList", () => {
  it("should put the native client first for nevent codes", () => {
    const links = generateClientList("nevent1xyz", event);

    expect(links[0]).toEqual({ name: "native client", url: "nostr:nevent1xyz" });
    expect(links).toContainEqual({ name: "Satellite", url: "https://satellite.earth/thread/abc" });
    expect(links).toHaveLength(10);
  });

  it("should build thread links from the code or the event id for note codes", () => {
    const links = generateClientList("note1xyz", event);

    expect(links.map((l) => l.name)).toEqual([
      "native client",
      "Snort",
      "Coracle",
      "Satellite",
      "Iris",
      "Yosup",
      "Nostr.band",
      "Primal",
      "Nostribe",
      "Nostrid"
    ]);
    expect(links[1].url).toBe("https://Snort.social/e/note1xyz");
    expect(links[7].url).toBe("https://primal.net/thread/abc");
  });

  it("should build profile links from the code or the pubkey", () => {
    const links = generateClientList("nprofile1xyz", event);

    expect(links[0].url).toBe("nostr:nprofile1xyz");
    expect(links).toContainEqual({ name: "Snort", url: "https://snort.social/p/nprofile1xyz" });
    expect(links).toContainEqual({ name: "Satellite", url: "https://satellite.earth/@nprofile1xyz" });
    expect(links).toContainEqual({ name: "Yosup", url: "https://yosup.app/profile/def" });
    expect(links).toContainEqual({ name: "Nostrid", url: "https://web.nostrid.app/account/def" });
  });

  it("should list article viewers for naddr codes", () => {
    expect(generateClientList("naddr1xyz", event)).toEqual([
      { name: "native client", url: "nostr:naddr1xyz" },
      { name: "habla", url: "https://habla.news/a/naddr1xyz" },
      { name: "blogstack", url: "https://blogstack.io/naddr1xyz" }
    ]);
  });

  it("should return only the native client for unknown prefixes", () => {
    expect(generateClientList("unknownprefix", event)).toEqual([
      { name: "native client", url: "nostr:unknownprefix" }
    ]);
  });
});
