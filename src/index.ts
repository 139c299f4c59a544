export { KIND_NAMES, kindLabel, describeKind, buildKindCatalog } from "./kinds/kindNames.js";
export { generateClientList } from "./clients/clientList.js";
export { getPreviewStyle, readHeader } from "./preview/previewStyle.js";
export { buildPreview } from "./preview/buildPreview.js";
export type { BuildPreviewOptions } from "./preview/buildPreview.js";
export { basicFormatting, replaceUrlsWithTags, abbreviateIdentifier } from "./render/formatting.js";
export { prettyJsonOrRaw, renderMarkdown, generateExcerpt, escapeHtml } from "./render/render.js";
export { mergeMaps } from "./utils/mergeMaps.js";
export { parseEvent, parseProfileMetadata, getTagValue, getAllTagValues } from "./parser/eventParser.js";
export { entityCodeFor, isAddressableKind } from "./nostr/codes.js";
export { findFirstImageUrl } from "./media/mediaScan.js";
export { loadConfig, parseKindLabels } from "./config/loadConfig.js";
export { defaultConfig } from "./config/defaults.js";
export type { ClientLink, Config, OutputFormat, Preview, PreviewStyle, ProfileMetadata, RequestHeaders } from "./types.js";
