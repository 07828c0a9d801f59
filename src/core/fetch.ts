import { Agent, fetch as undiciFetch, RequestInit, Response } from "undici";

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export const defaultFetch: FetchFn = (url, init) => undiciFetch(url, init);

let insecureAgent: Agent | undefined;

function getInsecureAgent(): Agent {
  if (!insecureAgent) {
    insecureAgent = new Agent({
      connect: {
        rejectUnauthorized: false,
      },
    });
  }
  return insecureAgent;
}

export function getFetchDispatcher(ignoreHttpsErrors: boolean): Agent | undefined {
  if (!ignoreHttpsErrors) {
    return undefined;
  }
  return getInsecureAgent();
}

/**
 * Runs `fetchFn` under an abort deadline that also covers `consume`, so a
 * stalled body stream times out the same way a stalled connection does.
 */
export async function fetchWithTimeout<T>(
  fetchFn: FetchFn,
  url: string,
  init: RequestInit,
  timeoutMs: number,
  consume: (response: Response) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const response = await fetchFn(url, { ...init, signal: controller.signal });
    return await consume(response);
  } finally {
    clearTimeout(timeout);
  }
}
