/**
 * Join a route onto a base URL, keeping any path the base is mounted under:
 * `resolveEndpoint("http://host/calc", "/reset")` is `http://host/calc/reset`.
 */
export function resolveEndpoint(baseUrl: string, route: string): string {
  const base = baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`;
  return new URL(route.replace(/^\/+/, ""), base).toString();
}
