import type { FetchFn, HttpResponseLike } from '../../server/services/httpClient.js';

export type FakeReply = { status: number; body?: string } | Error;

/**
 * A FetchFn that answers from `respond` and records every requested URL.
 * Thrown errors from `respond` become rejected fetches.
 */
export function fakeFetch(respond: (url: string, callIndex: number) => FakeReply): { fetchFn: FetchFn; calls: string[] } {
  const calls: string[] = [];
  const fetchFn: FetchFn = async (url) => {
    const reply = respond(url, calls.length);
    calls.push(url);
    if (reply instanceof Error) throw reply;
    const response: HttpResponseLike = {
      status: reply.status,
      text: async () => reply.body ?? '',
    };
    return response;
  };
  return { fetchFn, calls };
}

/** A sleep that records requested delays instead of waiting. */
export function recordingSleep(): { sleep: (ms: number) => Promise<void>; delays: number[] } {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms: number) => {
      delays.push(ms);
    },
  };
}
