import { z } from "zod";
import { PermanentError } from "@docrelay/errors";
import type { MetadataFields } from "./extraction.interface.js";

export const DOCUMENT_CLASSIFICATIONS = [
  "invoice",
  "receipt",
  "bank_statement",
  "contract",
  "government_letter",
  "private_letter",
  "invitation",
  "business_correspondence",
  "newsletter",
  "advertisement",
  "other",
] as const;

const optionalText = z
  .string()
  .nullish()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed && trimmed.toLowerCase() !== "unknown" ? trimmed : null;
  });

const metadataSchema = z.object({
  title: optionalText,
  date: optionalText,
  classification: optionalText,
});

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})/;

/** Pull the JSON object out of a model reply: a fenced block first, else the outermost braces. */
export function extractJsonObject(text: string): string | null {
  const fenced = /```(?:json)?\s*(\{[\s\S]*?\})\s*```/.exec(text);
  if (fenced?.[1]) {
    return fenced[1];
  }
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  return start !== -1 && end > start ? text.slice(start, end + 1) : null;
}

function normalizeDate(value: string | null): string | null {
  const match = value ? ISO_DATE.exec(value) : null;
  return match ? `${match[1]}-${match[2]}-${match[3]}` : null;
}

function normalizeClassification(value: string | null): string | null {
  if (!value) {
    return null;
  }
  const slug = value.toLowerCase().replace(/[^a-z0-9]+/g, "_").replace(/^_|_$/g, "");
  return DOCUMENT_CLASSIFICATIONS.find((c) => c === slug) ?? "other";
}

export function parseMetadataResponse(text: string): MetadataFields {
  const json = extractJsonObject(text);
  if (!json) {
    throw new PermanentError("Metadata reply contained no JSON object");
  }

  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error: unknown) {
    throw new PermanentError("Metadata reply was not valid JSON", { cause: error });
  }

  const parsed = metadataSchema.safeParse(raw);
  if (!parsed.success) {
    throw new PermanentError("Metadata reply had an unexpected shape", { cause: parsed.error });
  }

  return {
    title: parsed.data.title,
    date: normalizeDate(parsed.data.date),
    classification: normalizeClassification(parsed.data.classification),
  };
}
