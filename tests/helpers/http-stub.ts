/**
 * In-process HTTP stub for tests.
 */
import AdmZip from "adm-zip";
import type { HttpClient } from "../../scripts/launcher/utils.ts";

export type StubRequest = {
  url: string;
  method: string;
  headers: Headers;
  body?: string;
};

export type StubEntry =
  | Response
  | ((request: StubRequest) => Response | Promise<Response>);

export type StubClient = HttpClient & {
  requests: StubRequest[];
  count: (url: string) => number;
};

export function normalizeRequestUrl(input: string | URL): string {
  return typeof input === "string" ? input : input.href;
}

/**
 * Answers each request from `responses`, keyed by full URL. Unknown URLs
 * throw so that unexpected network access fails the test.
 */
export function createStubClient(responses: Record<string, StubEntry>): StubClient {
  const requests: StubRequest[] = [];
  const client: HttpClient = async (input, init) => {
    const url = normalizeRequestUrl(input);
    const request: StubRequest = {
      url,
      method: init?.method ?? "GET",
      headers: new Headers(init?.headers),
      body: typeof init?.body === "string" ? init.body : undefined,
    };
    requests.push(request);
    const entry = responses[url];
    if (!entry) {
      throw new Error(`Unexpected request: ${url}`);
    }
    const response = typeof entry === "function" ? await entry(request) : entry;
    return response.clone();
  };
  return Object.assign(client, {
    requests,
    count: (url: string) => requests.filter((r) => r.url === url).length,
  });
}

export function jsonResponse(body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { "Content-Type": "application/json" },
  });
}

export function textResponse(body: string): Response {
  return new Response(body, { status: 200 });
}

export function bytesResponse(body: Uint8Array): Response {
  return new Response(body, { status: 200 });
}

export function notFoundResponse(): Response {
  return new Response("not found", { status: 404, statusText: "Not Found" });
}

/** Builds an in-memory zip archive from path/content pairs. */
export function zipBytes(entries: Record<string, string>): Uint8Array {
  const zip = new AdmZip();
  for (const [name, content] of Object.entries(entries)) {
    zip.addFile(name, Buffer.from(content));
  }
  return zip.toBuffer();
}
