const UNSAFE_ASCII = /[^\x20-\x7e]|["\\]/g;

// RFC 5987 attr-chars plus the characters encodeURIComponent leaves alone but the grammar forbids.
function encodeExtValue(value: string): string {
  return encodeURIComponent(value).replace(
    /['()*]/g,
    (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`,
  );
}

/** `attachment` header with an ASCII fallback name and, when needed, a UTF-8 `filename*`. */
export function attachmentDisposition(filename: string): string {
  const fallback = filename.replace(UNSAFE_ASCII, '_');
  if (fallback === filename) return `attachment; filename="${filename}"`;
  return `attachment; filename="${fallback}"; filename*=UTF-8''${encodeExtValue(filename)}`;
}
