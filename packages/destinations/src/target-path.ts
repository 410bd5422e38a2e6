import { PermanentError } from "@docrelay/errors";
import type { ExtractedMetadata } from "@docrelay/types";

export const TARGET_PATH_PLACEHOLDERS = [
  "filename",
  "title",
  "classification",
  "year",
  "month",
  "day",
  "documentId",
] as const;

export type TargetPathPlaceholder = (typeof TARGET_PATH_PLACEHOLDERS)[number];

export interface TargetPathContext {
  documentId: string;
  /** Delivered file name, already ending in ".pdf". */
  filename: string;
  metadata: ExtractedMetadata | null;
  createdAt: Date;
}

export interface TargetPath {
  /** Folder segments joined with "/", "" for the destination root. */
  folder: string;
  name: string;
  /** `folder/name`, or just `name` at the root. */
  path: string;
}

const PLACEHOLDER = /\{([^{}]*)\}/g;
const UNSAFE_CHARS = /[\u0000-\u001f\u007f/\\:*?"<>|]/g;
const MAX_SEGMENT_LENGTH = 200;

function isPlaceholder(name: string): name is TargetPathPlaceholder {
  return (TARGET_PATH_PLACEHOLDERS as readonly string[]).includes(name);
}

/** Make a value safe to use as one path segment on every supported provider. */
export function sanitizeSegment(value: string): string {
  const cleaned = value
    .replace(UNSAFE_CHARS, "_")
    .replace(/\s+/g, " ")
    .trim()
    .replace(/[. ]+$/, "")
    .slice(0, MAX_SEGMENT_LENGTH);
  return cleaned === "" || cleaned === "." || cleaned === ".." ? "_" : cleaned;
}

function stem(filename: string): string {
  const dot = filename.lastIndexOf(".");
  return dot > 0 ? filename.slice(0, dot) : filename;
}

function dateParts(context: TargetPathContext): { year: string; month: string; day: string } {
  const match = context.metadata?.date?.match(/^(\d{4})-(\d{2})-(\d{2})$/);
  if (match?.[1] && match[2] && match[3]) {
    return { year: match[1], month: match[2], day: match[3] };
  }
  const created = context.createdAt;
  return {
    year: String(created.getUTCFullYear()),
    month: String(created.getUTCMonth() + 1).padStart(2, "0"),
    day: String(created.getUTCDate()).padStart(2, "0"),
  };
}

function placeholderValues(context: TargetPathContext): Record<TargetPathPlaceholder, string> {
  const title = context.metadata?.title?.trim();
  const classification = context.metadata?.classification?.trim();
  return {
    filename: context.filename,
    title: title ? title : stem(context.filename),
    classification: classification ? classification : "unclassified",
    documentId: context.documentId,
    ...dateParts(context),
  };
}

/**
 * Render a destination's target-path template.
 *
 * Every substituted value is sanitized into a single segment. An empty template or
 * one ending in "/" names a folder and the file keeps its delivered name.
 */
export function renderTargetPath(template: string, context: TargetPathContext): TargetPath {
  const values = placeholderValues(context);
  const rawSegments = template.split(/[\\/]+/).filter((segment) => segment.trim() !== "" && segment.trim() !== ".");

  const segments = rawSegments.map((segment) => {
    if (segment.trim() === "..") {
      throw new PermanentError(`Target path template "${template}" escapes the destination root`);
    }
    const rendered = segment.replace(PLACEHOLDER, (_match, name: string) => {
      if (!isPlaceholder(name)) {
        throw new PermanentError(`Target path template "${template}" uses unknown placeholder {${name}}`);
      }
      return sanitizeSegment(values[name]);
    });
    return sanitizeSegment(rendered);
  });

  if (segments.length === 0 || /[\\/]\s*$/.test(template)) {
    segments.push(sanitizeSegment(context.filename));
  }

  const name = segments.pop() ?? sanitizeSegment(context.filename);
  const folder = segments.join("/");
  return { folder, name, path: folder ? `${folder}/${name}` : name };
}

/** Split a rendered target path back into its folder and file name. */
export function splitTargetPath(path: string): TargetPath {
  const segments = path.split("/").filter((segment) => segment !== "");
  const name = segments.pop() ?? "";
  const folder = segments.join("/");
  return { folder, name, path: folder ? `${folder}/${name}` : name };
}
