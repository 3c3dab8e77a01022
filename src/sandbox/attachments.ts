import { createTaggedError } from "../core/Retry.js";
import type { AttachmentInput } from "../types/TaskRequest.js";

/**
 * An attachment decoded from its data URI.
 */
export interface DecodedAttachment {
  name: string;
  /** Lower-cased type/subtype, without parameters */
  mediaType: string;
  /** Parameters other than `base64`, e.g. { charset: "utf-8" } */
  params: Record<string, string>;
  data: Buffer;
}

const MEDIA_TYPE = /^[a-z0-9!#$&^_.+-]+\/[a-z0-9!#$&^_.+-]+$/i;
const BASE64_BODY = /^[A-Za-z0-9+/]*={0,2}$/;

/** Media types the model can look at directly as image input. */
const IMAGE_TYPES = new Set(["image/png", "image/jpeg", "image/jpg", "image/gif", "image/webp"]);

function invalid(name: string, reason: string) {
  return createTaggedError("ATTACHMENT_INVALID", `Attachment "${name}": ${reason}`, { name });
}

/**
 * Check that an attachment name is a single, plain file name.
 */
export function validateAttachmentName(name: string): string {
  if (!name || name === "." || name === "..") throw invalid(name, "name is empty or reserved");
  if (/[/\\\0]/.test(name)) throw invalid(name, "name must not contain path separators");
  return name;
}

/**
 * Decode an attachment's data URI.
 *
 * Only `data:` URIs are accepted. Base64 payloads must use the standard
 * alphabet with correct padding; anything else is rejected rather than
 * partially decoded.
 */
export function decodeAttachment(input: AttachmentInput): DecodedAttachment {
  const name = validateAttachmentName(input.name);
  const url = input.url.trim();

  if (!/^data:/i.test(url)) {
    throw invalid(name, "only data: URIs are supported");
  }

  const comma = url.indexOf(",");
  if (comma === -1) {
    throw invalid(name, "malformed data URI (missing ',')");
  }

  const header = url.slice("data:".length, comma);
  const body = url.slice(comma + 1);
  const [rawType = "", ...paramParts] = header.split(";");

  const mediaType = rawType.trim().toLowerCase() || "text/plain";
  if (!MEDIA_TYPE.test(mediaType)) {
    throw invalid(name, `unsupported media type "${rawType}"`);
  }

  let base64 = false;
  const params: Record<string, string> = {};
  for (const part of paramParts) {
    const trimmed = part.trim();
    if (trimmed.toLowerCase() === "base64") {
      base64 = true;
      continue;
    }
    const eq = trimmed.indexOf("=");
    if (eq <= 0) {
      throw invalid(name, `unsupported encoding "${trimmed}"`);
    }
    params[trimmed.slice(0, eq).toLowerCase()] = trimmed.slice(eq + 1);
  }

  return { name, mediaType, params, data: base64 ? decodeBase64(name, body) : decodePercent(name, body) };
}

function decodeBase64(name: string, body: string): Buffer {
  const compact = body.replace(/\s+/g, "");
  if (!BASE64_BODY.test(compact) || compact.length % 4 !== 0) {
    throw invalid(name, "malformed base64 payload");
  }
  return Buffer.from(compact, "base64");
}

function decodePercent(name: string, body: string): Buffer {
  try {
    return Buffer.from(decodeURIComponent(body), "utf-8");
  } catch {
    throw invalid(name, "malformed percent-encoded payload");
  }
}

export function isImageAttachment(attachment: DecodedAttachment): boolean {
  return IMAGE_TYPES.has(attachment.mediaType);
}

export function isTextAttachment(attachment: DecodedAttachment): boolean {
  return attachment.mediaType.startsWith("text/") || attachment.mediaType === "application/json";
}

/**
 * Re-encode a decoded image as a data URI suitable for an image content part.
 */
export function toDataUri(attachment: DecodedAttachment): string {
  return `data:${attachment.mediaType};base64,${attachment.data.toString("base64")}`;
}
