import MarkdownIt from "markdown-it";
import sanitizeHtml from "sanitize-html";
import { stringify as toToml } from "smol-toml";

const md = new MarkdownIt({
  html: false,
  linkify: true,
  typographer: true
});

const sanitizer = (html: string) =>
  sanitizeHtml(html, {
    allowedTags: sanitizeHtml.defaults.allowedTags.concat(["img", "h1", "h2", "h3", "h4", "h5", "h6"]),
    allowedAttributes: {
      a: ["href", "name", "target", "rel"],
      img: ["src", "alt", "title", "loading"],
      code: ["class"],
      pre: ["class"],
      '*': ["class", "id"]
    },
    allowedSchemes: ["http", "https", "mailto", "nostr"],
    disallowedTagsMode: "discard"
  });

export function escapeHtml(text: string): string {
  return md.utils.escapeHtml(text);
}

export function generateExcerpt(content: string, maxLength: number = 160): string {
  const plainText = content.replace(/[#*`\[\]]/g, '').replace(/\s+/g, ' ').trim();
  if (plainText.length <= maxLength) return plainText;
  return plainText.substring(0, maxLength).trim() + '...';
}

export function renderMarkdown(content: string): string {
  const raw = md.render(content);
  return sanitizer(raw);
}

/**
 * Re-renders JSON text as TOML for display. Anything that is not JSON, or
 * that TOML cannot represent, comes back as it was given.
 */
export function prettyJsonOrRaw(text: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return text;
  }

  try {
    const toml = toToml(parsed);
    return toml.trim().length > 0 ? toml : text;
  } catch {
    return text;
  }
}
