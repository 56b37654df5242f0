const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i;
const API_LABEL = "api.";

function hostOf(value: string) {
  if (SCHEME_PATTERN.test(value)) {
    try {
      return new URL(value).hostname;
    } catch {
      return value.replace(SCHEME_PATTERN, "").split(/[/:]/)[0] ?? "";
    }
  }
  return value.split(/[/:]/)[0] ?? "";
}

/**
 * Base platform domain of a CF API URL: its host, with a leading `api.`
 * label removed. A host without that label is kept as it is.
 *
 *   getBaseDomain("https://api.example.com") === "example.com"
 */
export function getBaseDomain(apiUrl: string) {
  const host = hostOf(apiUrl.trim());
  return host.startsWith(API_LABEL) ? host.slice(API_LABEL.length) : host;
}

/**
 * Canonical full-URL form of a user-supplied API endpoint. Accepts a URL, an
 * `api.` host or a bare base domain.
 */
export function normalizeApiUrl(value: string) {
  const trimmed = value.trim().replace(/\/+$/, "");
  if (!trimmed || SCHEME_PATTERN.test(trimmed)) {
    return trimmed;
  }
  return trimmed.startsWith(API_LABEL) ? `https://${trimmed}` : `https://${API_LABEL}${trimmed}`;
}
