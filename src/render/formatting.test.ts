import { describe, expect, it } from "vitest";
import { abbreviateIdentifier, basicFormatting, replaceUrlsWithTags } from "./formatting.js";

describe("replaceUrlsWithTags", () => {
  describe("images", () => {
    it("should turn an image URL into an img tag and consume surrounding whitespace", () => {
      expect(replaceUrlsWithTags("check https://x.com/a.png out")).toBe(
        'check<img src="https://x.com/a.png" alt="">out'
      );
    });

    it("should not also wrap the image URL in a link", () => {
      const result = replaceUrlsWithTags("https://x.com/a.png");
      expect(result).toBe('<img src="https://x.com/a.png" alt="">');
    });

    it("should replace only the first image in a line", () => {
      expect(replaceUrlsWithTags("https://x.com/a.png https://x.com/b.png")).toBe(
        '<img src="https://x.com/a.png" alt="">https://x.com/b.png'
      );
    });

    it("should try extensions in order, jpg before png", () => {
      expect(replaceUrlsWithTags("https://x.com/a.png https://x.com/b.jpg")).toBe(
        'https://x.com/a.png<img src="https://x.com/b.jpg" alt="">'
      );
    });

    it("should skip mention formatting once an image matched", () => {
      expect(replaceUrlsWithTags("nostr:npub1abcdefghijklmnop https://x.com/a.gif")).toBe(
        'nostr:npub1abcdefghijklmnop<img src="https://x.com/a.gif" alt="">'
      );
    });

    it("should treat upper-case extensions as plain links", () => {
      expect(replaceUrlsWithTags("https://x.com/A.PNG")).toBe(
        '<a href="https://x.com/A.PNG">https://x.com/A.PNG</a>'
      );
    });
  });

  describe("mentions", () => {
    it("should link a mention with an abbreviated label", () => {
      expect(replaceUrlsWithTags("nostr:npub1abcdefghijklmnop hello")).toBe(
        '<a href="/npub1abcdefghijklmnop">npub1a…klmnop</a>hello'
      );
    });

    it("should replace every mention in the line", () => {
      expect(replaceUrlsWithTags("nostr:note1qqqqqqqqqqqqqqqq and nostr:nevent1zzzzzzzzzzzzzzzz")).toBe(
        '<a href="/note1qqqqqqqqqqqqqqqq">note1q…qqqqqq</a>and<a href="/nevent1zzzzzzzzzzzzzzzz">nevent…zzzzzz</a>'
      );
    });

    it("should show short identifiers in full", () => {
      expect(replaceUrlsWithTags("nostr:note1abc")).toBe('<a href="/note1abc">note1abc</a>');
    });

    it("should leave unsupported prefixes alone", () => {
      expect(replaceUrlsWithTags("nostr:naddr1abc")).toBe("nostr:naddr1abc");
    });
  });

  describe("links", () => {
    it("should wrap URLs in anchors and keep the surrounding text", () => {
      expect(replaceUrlsWithTags("see https://example.com/page now")).toBe(
        'see <a href="https://example.com/page">https://example.com/page</a> now'
      );
    });

    it("should consume text glued to the front of a URL", () => {
      expect(replaceUrlsWithTags("(https://example.com)")).toBe(
        '<a href="https://example.com)">https://example.com)</a>'
      );
    });

    it("should return lines without matches unchanged", () => {
      expect(replaceUrlsWithTags("just some words")).toBe("just some words");
    });
  });
});

describe("basicFormatting", () => {
  it("should join lines with br tags", () => {
    expect(basicFormatting("line1\nline2")).toBe("line1<br/>line2");
  });

  it("should keep blank lines as empty segments", () => {
    expect(basicFormatting("a\n\nb")).toBe("a<br/><br/>b");
  });

  it("should format each line independently", () => {
    expect(basicFormatting("https://x.com/a.png\nhttps://x.com/b")).toBe(
      '<img src="https://x.com/a.png" alt=""><br/><a href="https://x.com/b">https://x.com/b</a>'
    );
  });
});

describe("abbreviateIdentifier", () => {
  it("should keep the first and last six characters", () => {
    expect(abbreviateIdentifier("npub1abcdefghijklmnop")).toBe("npub1a…klmnop");
  });

  it("should not abbreviate identifiers of twelve characters or fewer", () => {
    expect(abbreviateIdentifier("note1abcdefg")).toBe("note1abcdefg");
  });
});
