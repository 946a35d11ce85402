import slugifyModule from "slugify";

const slugify = slugifyModule as unknown as (
  value: string,
  options?: {
    replacement?: string;
    lower?: boolean;
    strict?: boolean;
    trim?: boolean;
  },
) => string;

/**
 * Filesystem-safe rendering of a display name: whitespace becomes `_`, path
 * separators and other unsafe characters are dropped, case is kept.
 */
export function makePathSegment(input: string, fallback: string): string {
  const segment = slugify(input, {
    replacement: "_",
    lower: false,
    trim: true,
  });

  if (segment.length === 0 || /^\.+$/.test(segment)) {
    return fallback;
  }
  return segment.slice(0, 96);
}

export function splitList(value: string | boolean | undefined): string[] | undefined {
  if (typeof value !== "string") {
    return undefined;
  }

  const items = [...new Set(value.split(",").map((item) => item.trim()).filter(Boolean))];
  return items.length > 0 ? items : undefined;
}
