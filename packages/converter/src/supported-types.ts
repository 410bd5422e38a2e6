import { readFileSync } from "node:fs";
import { z } from "zod";

const supportedTypesSchema = z.object({
  types: z.array(
    z.object({
      mime: z.string(),
      extension: z.string(),
      route: z.enum(["passthrough", "libreoffice", "chromium", "markdown"]),
      /** Content is text and is recognized by inspection rather than magic bytes. */
      text: z.boolean(),
      extraExtensions: z.array(z.string()),
    }),
  ),
  /** Non-canonical spellings clients send for a supported type. */
  aliases: z.record(z.string()),
});

export type SupportedType = z.infer<typeof supportedTypesSchema>["types"][number];

const table = supportedTypesSchema.parse(
  JSON.parse(readFileSync(new URL("./supported-types.json", import.meta.url), "utf-8")),
);

const BY_MIME: ReadonlyMap<string, SupportedType> = new Map(
  table.types.map((t) => [t.mime.toLowerCase(), t]),
);

const BY_EXTENSION: ReadonlyMap<string, SupportedType> = new Map(
  table.types.flatMap((t) => [t.extension, ...t.extraExtensions].map((ext) => [ext, t] as const)),
);

/** Lowercase, drop parameters (`; charset=…`) and resolve aliases. */
export function normalizeMime(mime: string): string {
  const bare = mime.split(";")[0]?.trim().toLowerCase() ?? "";
  return table.aliases[bare] ?? bare;
}

export function getSupportedType(mime: string): SupportedType | null {
  return BY_MIME.get(normalizeMime(mime)) ?? null;
}

export function getSupportedTypeByExtension(extension: string): SupportedType | null {
  return BY_EXTENSION.get(extension.replace(/^\./, "").toLowerCase()) ?? null;
}
