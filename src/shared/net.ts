/**
 * Parse a --listen value (e.g. "127.0.0.1:7350" or "7350") into host and port.
 */
export function parseListen(listen: string): { host: string; port: number } {
  const defaultHost = "127.0.0.1";
  const defaultPort = 7350;
  if (!listen || listen === "") return { host: defaultHost, port: defaultPort };
  const colon = listen.lastIndexOf(":");
  if (colon === -1) {
    const port = parseInt(listen, 10);
    if (Number.isNaN(port) || port <= 0 || port > 65535)
      return { host: defaultHost, port: defaultPort };
    return { host: defaultHost, port };
  }
  const host = listen.slice(0, colon).trim() || defaultHost;
  const port = parseInt(listen.slice(colon + 1), 10);
  if (Number.isNaN(port) || port <= 0 || port > 65535)
    return { host, port: defaultPort };
  return { host, port };
}

/** Join a hub base URL and an API path without doubling slashes. */
export function joinUrl(base: string, path: string): string {
  return `${base.replace(/\/+$/, "")}/${path.replace(/^\/+/, "")}`;
}
