export interface HostPort {
  host: string;
  port: number;
}

function parsePort(raw: string): number | undefined {
  if (!/^\d+$/.test(raw.trim())) return undefined;
  const port = parseInt(raw, 10);
  if (port <= 0 || port > 65535) return undefined;
  return port;
}

/**
 * Parse an address such as "0.0.0.0:6015", "6015" or "patch.example.net".
 * Missing or invalid parts fall back to the given defaults.
 */
export function parseHostPort(value: string | undefined, fallback: HostPort): HostPort {
  if (!value || value.trim() === "") return { ...fallback };
  const trimmed = value.trim();
  const colon = trimmed.lastIndexOf(":");
  if (colon === -1) {
    if (/^\d+$/.test(trimmed)) return { host: fallback.host, port: parsePort(trimmed) ?? fallback.port };
    return { host: trimmed, port: fallback.port };
  }
  const host = trimmed.slice(0, colon).trim().replace(/^\[(.*)\]$/, "$1") || fallback.host;
  const port = parsePort(trimmed.slice(colon + 1)) ?? fallback.port;
  return { host, port };
}

export function formatHostPort({ host, port }: HostPort): string {
  return host.includes(":") ? `[${host}]:${port}` : `${host}:${port}`;
}
