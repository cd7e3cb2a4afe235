const CONTROL_CHARS = /[\u0000-\u001F\u007F-\u009F]/g;
const RESERVED_CHARS = /[<>:"/\\|?*]/g;
const WINDOWS_RESERVED_NAMES = /^(con|prn|aux|nul|com[1-9]|lpt[1-9])(\..*)?$/i;
const MAX_KEPT_EXTENSION_BYTES = 16;

/** Longest path segment ext4, NTFS and SMB accept, in UTF-8 bytes */
export const NAME_MAX_BYTES = 255;

export const sanitizeString = (str: string): string => {
  return str.replace(CONTROL_CHARS, "").trim();
};

/**
 * Truncate by code point so a surrogate pair is never split.
 */
export function truncate(value: string, maxLength: number): string {
  const chars = Array.from(value);
  return chars.length > maxLength ? chars.slice(0, maxLength).join("") : value;
}

/**
 * Cut `value` to at most `maxBytes` of UTF-8, keeping whole code points.
 */
export function truncateBytes(value: string, maxBytes: number): string {
  let used = 0;
  let result = "";
  for (const char of value) {
    used += Buffer.byteLength(char, "utf8");
    if (used > maxBytes) break;
    result += char;
  }
  return result;
}

function fitBytes(name: string, maxBytes: number): string {
  if (Buffer.byteLength(name, "utf8") <= maxBytes) {
    return name;
  }
  const { stem, ext } = splitExtension(name);
  const extBytes = Buffer.byteLength(ext, "utf8");
  if (ext && extBytes <= MAX_KEPT_EXTENSION_BYTES) {
    return truncateBytes(stem, maxBytes - extBytes).replace(/[. ]+$/, "") + ext;
  }
  return truncateBytes(name, maxBytes);
}

/**
 * Make `name` safe as a single path segment on both POSIX and SMB shares.
 * `maxLength` counts code points, `maxBytes` the UTF-8 size the file system
 * sees; a short extension survives byte truncation. Returns an empty string
 * when nothing usable is left.
 */
export function sanitizeFilename(
  name: string,
  maxLength = 255,
  maxBytes = NAME_MAX_BYTES,
): string {
  let cleaned = sanitizeString(name)
    .replace(RESERVED_CHARS, "")
    .replace(/\s+/g, " ");

  cleaned = fitBytes(truncate(cleaned, maxLength), maxBytes).replace(/[. ]+$/, "").trim();

  if (cleaned === "." || cleaned === "..") {
    return "";
  }
  if (WINDOWS_RESERVED_NAMES.test(cleaned)) {
    return `${cleaned}_`;
  }
  return cleaned;
}

/**
 * Folder names keep their hierarchy visible: separators become underscores
 * before the usual filename rules apply.
 */
export function sanitizeFolderName(folder: string, delimiter = "/"): string {
  let flattened = folder.replace(/[/\\]/g, "_");
  if (delimiter && delimiter !== "/" && delimiter !== "\\") {
    flattened = flattened.split(delimiter).join("_");
  }
  return sanitizeFilename(flattened) || "_";
}

/**
 * Split `name.ext` at the last dot; dotfiles have no extension.
 */
export function splitExtension(name: string): { stem: string; ext: string } {
  const dot = name.lastIndexOf(".");
  if (dot <= 0) {
    return { stem: name, ext: "" };
  }
  return { stem: name.slice(0, dot), ext: name.slice(dot) };
}
