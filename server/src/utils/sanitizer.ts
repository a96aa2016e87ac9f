const MAX_FILENAME_LENGTH = 128;

/**
 * Sanitizes a client-supplied filename before it touches the filesystem.
 * Rules:
 * - Basename only (no path traversal)
 * - Alphanumeric, underscore, hyphen, dot only
 * - Whitespace replaced by underscore
 * - No leading dots
 * - Max 128 characters, extension kept when truncating
 * - Fallback when nothing is left
 */
export function sanitizeFilename(
  name: string | undefined | null,
  fallback = "file",
): string {
  if (!name) return fallback;

  const parts = name.split(/[\\/]/);
  const base = parts.pop() || "";

  let s = base.replace(/\s+/g, "_");
  s = s.replace(/[^A-Za-z0-9._-]/g, "");
  s = s.replace(/^\.+/, "");

  if (s.length > MAX_FILENAME_LENGTH) {
    const dot = s.lastIndexOf(".");
    const ext = dot > 0 ? s.slice(dot) : "";
    if (ext.length > 0 && ext.length < 16) {
      s = s.slice(0, MAX_FILENAME_LENGTH - ext.length) + ext;
    } else {
      s = s.slice(0, MAX_FILENAME_LENGTH);
    }
  }

  if (!s) return fallback;

  return s;
}

/** Lower-case extension without the dot, or "" when there is none. */
export function getExtension(name: string): string {
  const base = name.split(/[\\/]/).pop() || "";
  const dot = base.lastIndexOf(".");
  if (dot <= 0 || dot === base.length - 1) return "";
  return base.slice(dot + 1).toLowerCase();
}

export function hasAllowedExtension(
  name: string,
  allowed: readonly string[],
): boolean {
  const ext = getExtension(name);
  return ext !== "" && allowed.includes(ext);
}
