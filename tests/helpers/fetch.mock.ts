type FetchArgs = Parameters<typeof fetch>;
type FetchInput = FetchArgs[0];

export interface RecordedCall {
  url: string;
  method: string;
  headers: Record<string, string>;
  body?: unknown;
}

export type FetchMockItem =
  | Response
  | { body?: unknown; status?: number }
  | ((input: FetchInput, init?: RequestInit) => Response | Promise<Response>);

function toUrlString(input: FetchInput): string {
  if (typeof input === 'string') return input;
  if (input instanceof URL) return input.toString();
  return input.url;
}

function toHeaderRecord(headers: HeadersInit | undefined): Record<string, string> {
  const result: Record<string, string> = {};
  new Headers(headers).forEach((value, key) => {
    result[key] = value;
  });
  return result;
}

/**
 * Fetch stand-in with queued responses. Unlike a global mock it is handed to
 * the code under test, so nothing leaks between tests.
 */
export function createFetchMock() {
  const calls: RecordedCall[] = [];
  const queue: FetchMockItem[] = [];

  const jsonResponse = (body: unknown, status: number) =>
    new Response(status === 204 || body === undefined ? null : typeof body === 'string' ? body : JSON.stringify(body), {
      status,
      headers: { 'content-type': 'application/vnd.api+json' }
    });

  const fetchMock: typeof fetch = async (input, init) => {
    const url = toUrlString(input);
    calls.push({
      url,
      method: init?.method ?? 'GET',
      headers: toHeaderRecord(init?.headers),
      body: typeof init?.body === 'string' ? JSON.parse(init.body) : undefined
    });
    const next = queue.shift();
    if (!next) throw new Error(`No mock queued for fetch: ${url}`);
    if (typeof next === 'function') return await Promise.resolve(next(input, init));
    if (next instanceof Response) return next;
    return jsonResponse(next.body, next.status ?? 200);
  };

  return {
    fetch: fetchMock,
    push: (item: FetchMockItem) => queue.push(item),
    pushJson: (body: unknown, status = 200) => queue.push({ body, status }),
    calls,
    queue,
    /** Query parameters of the nth recorded call. */
    query: (index = 0) => new URL(calls[index].url).searchParams,
    path: (index = 0) => new URL(calls[index].url).pathname
  };
}

export type FetchMock = ReturnType<typeof createFetchMock>;
