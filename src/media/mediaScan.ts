const plainUrlRegex = /(https?:\/\/[^\s)\]]+)/g;

const IMAGE_EXTENSIONS = new Set(["jpg", "jpeg", "png", "webp", "gif"]);

function isImageUrl(url: string): boolean {
  try {
    const pathname = new URL(url).pathname.toLowerCase();
    const ext = pathname.includes(".") ? pathname.split(".").pop() || "" : "";
    return IMAGE_EXTENSIONS.has(ext);
  } catch {
    return false;
  }
}

export function findFirstImageUrl(content: string): string | undefined {
  for (const match of content.matchAll(plainUrlRegex)) {
    if (isImageUrl(match[1])) return match[1];
  }
  return undefined;
}
