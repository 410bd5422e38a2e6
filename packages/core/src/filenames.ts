const CONTROL_CHARS = /[\u0000-\u001f\u007f]/g;
const MAX_NAME_LENGTH = 255;

/**
 * Reduce a client-claimed file name to a display basename: directories, control
 * characters and surrounding whitespace are dropped.
 */
export function displayName(claimed: string | null | undefined, fallback = "document"): string {
  const base = (claimed ?? "").split(/[\\/]/).pop() ?? "";
  const cleaned = base.replace(CONTROL_CHARS, "").replace(/\s+/g, " ").trim().slice(0, MAX_NAME_LENGTH);
  return cleaned === "" || cleaned === "." || cleaned === ".." ? fallback : cleaned;
}

/** The name a document is delivered under: its original name with a `.pdf` extension. */
export function deliveredName(originalName: string): string {
  const dot = originalName.lastIndexOf(".");
  const stem = dot > 0 ? originalName.slice(0, dot) : originalName;
  return `${stem}.pdf`;
}

/** File name from a Content-Disposition header, preferring the RFC 5987 form. */
export function filenameFromContentDisposition(header: string | null): string | null {
  if (!header) {
    return null;
  }
  const extended = /filename\*\s*=\s*(?:UTF-8|utf-8)''([^;]+)/.exec(header);
  if (extended?.[1]) {
    try {
      return decodeURIComponent(extended[1].trim());
    } catch {
      return extended[1].trim();
    }
  }
  const plain = /filename\s*=\s*(?:"([^"]*)"|([^;]+))/.exec(header);
  const value = plain?.[1] ?? plain?.[2];
  return value ? value.trim() : null;
}

export function filenameFromUrl(url: URL): string | null {
  const last = url.pathname.split("/").filter(Boolean).pop();
  if (!last) {
    return null;
  }
  try {
    return decodeURIComponent(last);
  } catch {
    return last;
  }
}
