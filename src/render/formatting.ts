const IMAGE_EXTENSIONS = [".jpg", ".jpeg", ".png", ".webp", ".gif"];

const imagePatterns = IMAGE_EXTENSIONS.map(
  (extension) => new RegExp(`\\s*(https?://\\S+${extension.replace(".", "\\.")})\\s*`)
);
const mentionPattern = /\s*nostr:((npub|note|nevent|nprofile)1[a-z0-9]+)\s*/g;
const urlPattern = /\S*(https?:\/\/\S+)\S*/g;

export function abbreviateIdentifier(identifier: string): string {
  if (identifier.length <= 12) return identifier;
  return identifier.slice(0, 6) + "…" + identifier.slice(-6);
}

// Only the first image in a line becomes an <img>, and then the line is done.
function replaceFirstImage(line: string): string | undefined {
  for (const pattern of imagePatterns) {
    if (!pattern.test(line)) continue;
    return line.replace(pattern, (_match, url: string) => `<img src="${url}" alt="">`);
  }
  return undefined;
}

export function replaceUrlsWithTags(line: string): string {
  const withImage = replaceFirstImage(line);
  if (withImage !== undefined) return withImage;

  const withMentions = line.replace(mentionPattern, (match, identifier: string | undefined) => {
    if (!identifier) return match;
    return `<a href="/${identifier}">${abbreviateIdentifier(identifier)}</a>`;
  });

  return withMentions.replace(urlPattern, (_match, url: string) => `<a href="${url}">${url}</a>`);
}

export function basicFormatting(input: string): string {
  return input
    .split("\n")
    .map((line) => replaceUrlsWithTags(line))
    .join("<br/>");
}
