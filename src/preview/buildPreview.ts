import { nip19 } from "nostr-tools";
import type { Event as NostrEvent } from "nostr-tools";
import { generateClientList } from "../clients/clientList.js";
import { buildKindCatalog, describeKind } from "../kinds/kindNames.js";
import { findFirstImageUrl } from "../media/mediaScan.js";
import { entityCodeFor } from "../nostr/codes.js";
import { getTagValue, parseProfileMetadata } from "../parser/eventParser.js";
import { basicFormatting } from "../render/formatting.js";
import { escapeHtml, generateExcerpt, prettyJsonOrRaw, renderMarkdown } from "../render/render.js";
import type { Config, Preview, RequestHeaders } from "../types.js";
import { getPreviewStyle } from "./previewStyle.js";

export interface BuildPreviewOptions {
  code?: string;
  headers: RequestHeaders;
  config: Config;
}

type PreviewBody = Pick<Preview, "title" | "description" | "image" | "content">;

function profileBody(event: NostrEvent, maxLength: number): PreviewBody {
  const profile = parseProfileMetadata(event.content);
  return {
    title: profile.display_name || profile.name || nip19.npubEncode(event.pubkey),
    description: generateExcerpt(profile.about || "", maxLength),
    image: profile.picture,
    content: `<pre>${escapeHtml(prettyJsonOrRaw(event.content))}</pre>`
  };
}

function articleBody(event: NostrEvent, maxLength: number): PreviewBody {
  return {
    title: getTagValue(event.tags, "title") || "Untitled",
    description: getTagValue(event.tags, "summary") || generateExcerpt(event.content, maxLength),
    image: getTagValue(event.tags, "image"),
    content: renderMarkdown(event.content)
  };
}

function noteBody(event: NostrEvent, maxLength: number): PreviewBody {
  return {
    title: nip19.npubEncode(event.pubkey),
    description: generateExcerpt(event.content, maxLength),
    image: findFirstImageUrl(event.content),
    content: basicFormatting(escapeHtml(event.content))
  };
}

export function buildPreview(event: NostrEvent, options: BuildPreviewOptions): Preview {
  const { config } = options;
  const code = options.code || entityCodeFor(event);
  const catalog = buildKindCatalog(config.kinds.extra_labels);
  const maxLength = config.render.summary_max_length;

  let body: PreviewBody;
  if (event.kind === 0) {
    body = profileBody(event, maxLength);
  } else if (event.kind === 30023) {
    body = articleBody(event, maxLength);
  } else {
    body = noteBody(event, maxLength);
  }

  return {
    code,
    style: getPreviewStyle(options.headers),
    kind: event.kind,
    kindLabel: describeKind(event.kind, catalog),
    ...body,
    clients: generateClientList(code, event)
  };
}
