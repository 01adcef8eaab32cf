/**
 * robots.txt support: disallow rules and crawl-delay for the "*" agent
 */

export interface RobotsInfo {
  crawlDelayMs?: number;
  disallowed: string[];
}

/**
 * Extracts the rules that apply to every user agent
 */
export function parseRobots(text: string): RobotsInfo {
  let crawlDelayMs: number | undefined;
  const disallowed: string[] = [];
  let inUserAgentAll = false;
  let lastWasAgent = false;

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.replace(/#.*$/, "").trim();
    const colon = line.indexOf(":");
    if (colon === -1) continue;

    const directive = line.slice(0, colon).trim().toLowerCase();
    const value = line.slice(colon + 1).trim();

    if (directive === "user-agent") {
      // consecutive user-agent lines share one group
      const isAll = value === "*";
      inUserAgentAll = lastWasAgent ? inUserAgentAll || isAll : isAll;
      lastWasAgent = true;
      continue;
    }
    lastWasAgent = false;

    if (!inUserAgentAll) continue;

    if (directive === "crawl-delay") {
      const delay = parseFloat(value);
      if (!isNaN(delay) && delay >= 0) {
        crawlDelayMs = Math.round(delay * 1000);
      }
    } else if (directive === "disallow" && value) {
      disallowed.push(value);
    }
  }

  return { crawlDelayMs, disallowed };
}

/**
 * Checks if a URL is allowed by robots.txt rules
 */
export function isUrlAllowed(url: string, disallowed: readonly string[]): boolean {
  let path: string;
  try {
    const parsed = new URL(url);
    path = parsed.pathname + parsed.search;
  } catch {
    return false;
  }

  for (const rule of disallowed) {
    if (rule === "/" || path.startsWith(rule)) {
      return false;
    }
  }
  return true;
}

/**
 * Fetches robots.txt for the origin of `baseUrl`. A missing or unreadable
 * file means no restrictions.
 */
export async function getRobotsInfo(
  baseUrl: string,
  fetchImpl: typeof fetch = fetch,
  timeoutMs = 10000
): Promise<RobotsInfo> {
  const robotsUrl = new URL("/robots.txt", baseUrl).toString();

  let response: Response;
  try {
    response = await fetchImpl(robotsUrl, {
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (error) {
    console.log(
      `   ⚠️  robots.txt unavailable (${error instanceof Error ? error.message : String(error)})`
    );
    return { disallowed: [] };
  }

  if (!response.ok) {
    return { disallowed: [] };
  }
  return parseRobots(await response.text());
}
