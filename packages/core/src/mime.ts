import { fileTypeFromBuffer } from "file-type";
import {
  getSupportedType,
  getSupportedTypeByExtension,
  type SupportedType,
} from "@docrelay/converter";

/** Containers whose signature alone does not name the document type. */
const CONTAINER_MIMES = new Set(["application/x-cfb", "application/zip"]);
const TEXT_SNIFF_BYTES = 8192;

export interface SniffInput {
  bytes: Uint8Array;
  filename: string;
  declaredMime?: string | null;
}

function claimedType(input: SniffInput): SupportedType | null {
  const byMime = input.declaredMime ? getSupportedType(input.declaredMime) : null;
  if (byMime) {
    return byMime;
  }
  const dot = input.filename.lastIndexOf(".");
  return dot >= 0 ? getSupportedTypeByExtension(input.filename.slice(dot + 1)) : null;
}

function decodeHead(bytes: Uint8Array): string | null {
  const head = bytes.subarray(0, TEXT_SNIFF_BYTES);
  if (head.includes(0)) {
    return null;
  }
  try {
    // stream mode tolerates a multi-byte character cut off at the sniff boundary
    return new TextDecoder("utf-8", { fatal: true }).decode(head, { stream: true });
  } catch {
    return null;
  }
}

function sniffText(bytes: Uint8Array, claimed: SupportedType | null): string | null {
  const text = decodeHead(bytes);
  if (text === null) {
    return null;
  }

  const head = text.replace(/^\ufeff/, "").trimStart().slice(0, 1024).toLowerCase();
  if (head.startsWith("{\\rtf")) {
    return "application/rtf";
  }
  if (head.startsWith("<!doctype html") || head.startsWith("<html") || /<html[\s>]/.test(head)) {
    return "text/html";
  }
  if (head.startsWith("<svg") || (head.startsWith("<?xml") && head.includes("<svg"))) {
    return "image/svg+xml";
  }
  // Markdown, CSV and plain text only differ by what the sender claims.
  if (claimed?.text && (claimed.route === "markdown" || claimed.mime === "text/csv")) {
    return claimed.mime;
  }
  return "text/plain";
}

/**
 * Determine the supported MIME type of a payload from its content.
 *
 * Magic bytes decide first. Office containers (CFB, zip) fall back to the claimed type
 * when it names a document format. Text falls back to inspection. Returns null when the
 * content matches no supported type.
 */
export async function sniffMime(input: SniffInput): Promise<string | null> {
  const claimed = claimedType(input);
  const detected = await fileTypeFromBuffer(input.bytes);

  if (detected && detected.mime !== "application/xml") {
    if (CONTAINER_MIMES.has(detected.mime)) {
      return claimed && !claimed.text && claimed.route === "libreoffice" ? claimed.mime : null;
    }
    return getSupportedType(detected.mime)?.mime ?? null;
  }

  return sniffText(input.bytes, claimed);
}
