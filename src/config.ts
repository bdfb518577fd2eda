import { config } from "dotenv";
import { CacheMode, parseCacheMode } from "./types.js";

config();

function getPlatformUserAgent(version: string): string {
  const platform = process.platform;

  switch (platform) {
    case "darwin":
      return `untis-bridge/${version} (Macintosh; macOS) Node.js/${process.versions.node}`;
    case "win32":
      return `untis-bridge/${version} (Windows NT) Node.js/${process.versions.node}`;
    case "linux":
    default:
      return `untis-bridge/${version} (X11; Linux) Node.js/${process.versions.node}`;
  }
}

function readInteger(value: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(value ?? "", 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

const CLIENT_VERSION = process.env.UNTIS_CLIENT_VERSION || "1.0.0";

export const CONFIG = {
  untis: {
    server: process.env.UNTIS_SERVER || "",
    school: process.env.UNTIS_SCHOOL || "",
    username: process.env.UNTIS_USERNAME || "",
    password: process.env.UNTIS_PASSWORD || "",
    requestTimeoutMs: readInteger(process.env.UNTIS_REQUEST_TIMEOUT_MS, 15000),
    cacheMode:
      parseCacheMode(process.env.UNTIS_CACHE_MODE) ?? CacheMode.ONLINE_ONLY,
    schoolSearchUrls: [
      process.env.UNTIS_SCHOOL_SEARCH_URL ||
        "https://mobile.webuntis.com/ms/schoolquery2",
      "https://schoolsearch.webuntis.com/schoolquery2",
    ],
  },
  client: {
    applicationId: process.env.UNTIS_APPLICATION_ID || "untis-bridge",
    version: CLIENT_VERSION,
    platform: "node",
  },
  mcp: {
    serverName: process.env.MCP_SERVER_NAME || "untis-bridge",
    serverVersion: process.env.MCP_SERVER_VERSION || "1.0.0",
  },
  userAgent: process.env.USER_AGENT || getPlatformUserAgent(CLIENT_VERSION),
  logLevel: process.env.LOG_LEVEL || "info",
} as const;

export function clientHeaders(): Record<string, string> {
  return {
    "User-Agent": CONFIG.userAgent,
    "X-Untis-Application-ID": CONFIG.client.applicationId,
    "X-Untis-Application-Version": CONFIG.client.version,
    "X-Untis-Platform": CONFIG.client.platform,
  };
}
