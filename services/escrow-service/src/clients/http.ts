export interface HttpResult<T> {
  ok: boolean;
  status: number;
  data?: T;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

/** status 0 means the peer could not be reached (network error or timeout). */
export async function requestJson<T>(
  url: string,
  init: RequestInit,
  timeoutMs = 5000,
): Promise<HttpResult<T>> {
  try {
    const response = await fetch(url, {
      ...init,
      signal: AbortSignal.timeout(timeoutMs),
    });

    const contentType = response.headers.get("content-type") || "";
    let data: unknown;
    if (contentType.includes("application/json")) {
      data = await response.json();
    }

    return {
      ok: response.ok,
      status: response.status,
      data: data as T,
    };
  } catch {
    return {
      ok: false,
      status: 0,
    };
  }
}

export function getErrorMessage(payload: unknown): string | undefined {
  if (!isObject(payload)) return undefined;
  return typeof payload.message === "string" && payload.message ? payload.message : undefined;
}

export function trimBaseUrl(url: string): string {
  return url.replace(/\/$/, "");
}
