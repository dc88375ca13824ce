// Endpoint URL helpers

/** Query parameter carrying the caller's identity on transport connects */
export const PEER_ID_PARAM = "did";

/** Merge query parameters into a URL, replacing existing values of the same name */
export function addRequestParams(url: string, params: Record<string, string>): string {
  const parsed = new URL(url);
  for (const [key, value] of Object.entries(params)) {
    parsed.searchParams.set(key, value);
  }
  return parsed.toString();
}

/** Strip query string and fragment */
export function removeRequestParams(url: string): string {
  const parsed = new URL(url);
  parsed.search = "";
  parsed.hash = "";
  return parsed.toString();
}
