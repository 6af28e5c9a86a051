import { createWriteStream } from "node:fs";
import { dirname } from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import type { ReadableStream as WebReadableStream } from "node:stream/web";
import AdmZip from "adm-zip";
import fse from "fs-extra";
import { NetworkError } from "../types/errors.ts";

export const DEFAULT_USER_AGENT = "hearth-launcher/0.1.0 (+https://github.com/hearth-launcher)";

export type HttpClient = (
  input: string | URL,
  init?: RequestInit,
) => Promise<Response>;

export function createHttpClient(userAgent?: string): HttpClient {
  const ua = userAgent ?? DEFAULT_USER_AGENT;
  return (input: string | URL, init?: RequestInit) => {
    const headers = new Headers(init?.headers);
    if (!headers.has("User-Agent")) headers.set("User-Agent", ua);
    return fetch(input, { ...init, headers });
  };
}

async function ensureOk(response: Response, url: string): Promise<Response> {
  if (!response.ok) {
    throw new NetworkError(
      `Request failed for ${url} (${response.status} ${response.statusText}).`,
      url,
      response.status,
    );
  }
  return response;
}

export async function fetchJson(
  client: HttpClient,
  url: string,
  init?: RequestInit,
): Promise<unknown> {
  const headers = new Headers(init?.headers);
  headers.set("Accept", "application/json");
  const response = await ensureOk(await client(url, { ...init, headers }), url);
  const value: unknown = await response.json();
  return value;
}

export async function fetchText(
  client: HttpClient,
  url: string,
): Promise<string> {
  const response = await ensureOk(await client(url), url);
  return await response.text();
}

export async function postJson(
  client: HttpClient,
  url: string,
  body: unknown,
  headers: Record<string, string> = {},
): Promise<unknown> {
  return await fetchJson(client, url, {
    method: "POST",
    body: JSON.stringify(body),
    headers: { "Content-Type": "application/json", ...headers },
  });
}

/**
 * Streams `url` into `destination`, creating parent directories. A failed
 * transfer removes what it wrote; a killed process can still leave a
 * partial file.
 */
export async function downloadFile(
  client: HttpClient,
  url: string,
  destination: string,
): Promise<void> {
  const response = await ensureOk(await client(url, { redirect: "follow" }), url);

  const body = response.body;
  if (!body) {
    throw new NetworkError(`Download response from ${url} did not include a body.`, url);
  }

  await fse.ensureDir(dirname(destination));
  const webStream: WebReadableStream<Uint8Array> = body;
  try {
    await pipeline(Readable.fromWeb(webStream), createWriteStream(destination));
  } catch (error) {
    await fse.remove(destination);
    throw new NetworkError(`Failed to download ${url}.`, url, undefined, error);
  }
}

export function extractZip(zipPath: string, destDir: string): void {
  new AdmZip(zipPath).extractAllTo(destDir, true);
}

export function createZip(sourceDir: string, zipPath: string): void {
  const zip = new AdmZip();
  zip.addLocalFolder(sourceDir);
  zip.writeZip(zipPath);
}
