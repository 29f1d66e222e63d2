export type UrlCheck = { ok: true; url: URL } | { ok: false; error: string };

const ALLOWED_PREFIXES = ["http://", "https://"] as const;

// unpaired UTF-16 surrogates cannot be percent-encoded
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

/**
 * Accepts only strings that begin with `http://` or `https://` verbatim and also
 * parse as a URL. The string itself is what gets stored and redirected to.
 */
export function validateHttpUrl(s: string): UrlCheck {
  if (!ALLOWED_PREFIXES.some((prefix) => s.startsWith(prefix))) {
    return { ok: false, error: "url must start with http:// or https://" };
  }
  if (LONE_SURROGATE.test(s)) {
    return { ok: false, error: "url must be a valid URL" };
  }

  try {
    return { ok: true, url: new URL(s) };
  } catch {
    return { ok: false, error: "url must be a valid URL" };
  }
}

/**
 * Percent-encodes every run of characters a header value cannot carry
 * (controls, space, DEL and anything beyond ASCII). Existing escapes stay as they are.
 */
export function toLocationHeader(url: string): string {
  return url.replace(/[^\x21-\x7e]+/g, (run) => encodeURIComponent(run));
}
