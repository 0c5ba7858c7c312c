import type { FetchFn } from "../model-catalog";

export interface RecordedRequest {
  url: string;
  method: string;
  headers: Headers;
  body: string | undefined;
}

export type FakeHandler = (req: RecordedRequest, init: RequestInit | undefined) => Response | Promise<Response>;

export function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

export function textResponse(status: number, body: string): Response {
  return new Response(body, { status, headers: { "content-type": "text/plain" } });
}

/** In-process stand-in for fetch that records every request it sees. */
export function createFakeFetch(handler: FakeHandler): { fetch: FetchFn; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];

  const fetch: FetchFn = async (input, init) => {
    const url = typeof input === "string" ? input : input instanceof URL ? input.href : input.url;
    const recorded: RecordedRequest = {
      url,
      method: init?.method ?? "GET",
      headers: new Headers(init?.headers),
      body: typeof init?.body === "string" ? init.body : undefined,
    };
    requests.push(recorded);
    return handler(recorded, init);
  };

  return { fetch, requests };
}

/** Never answers; rejects with the signal's reason once the caller aborts. */
export const hangingFetch: FetchFn = (_input, init) =>
  new Promise<Response>((_resolve, reject) => {
    const signal = init?.signal;
    if (!signal) return;
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    signal.addEventListener("abort", () => reject(signal.reason));
  });
