import { describeError, TransientIoError } from "@wattkeeper/domain";

export interface FeedResponse {
  body: string;
  artifactName: string;
}

export interface FeedDownload {
  bytes: Buffer;
  artifactName: string;
}

async function request<T>(url: string, timeoutMs: number, read: (response: Response) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  try {
    let response: Response;
    try {
      response = await fetch(url, {signal: controller.signal, headers: {"Cache-Control": "no-cache"}});
    } catch (error) {
      throw new TransientIoError(`GET ${url} failed: ${describeError(error)}`, {cause: error});
    }
    if (!response.ok) {
      throw new TransientIoError(`HTTP ${response.status} ${response.statusText}`);
    }
    return await read(response);
  } finally {
    clearTimeout(timer);
  }
}

export function fetchFeed(url: string, timeoutMs: number): Promise<FeedResponse> {
  return request(url, timeoutMs, async (response) => ({
    body: await response.text(),
    artifactName: artifactNameFrom(url, response.headers.get("content-disposition")),
  }));
}

export function fetchFeedBytes(url: string, timeoutMs: number): Promise<FeedDownload> {
  return request(url, timeoutMs, async (response) => ({
    bytes: Buffer.from(await response.arrayBuffer()),
    artifactName: artifactNameFrom(url, response.headers.get("content-disposition")),
  }));
}

export function artifactNameFrom(url: string, contentDisposition: string | null): string {
  const match = contentDisposition ? /filename\*?=(?:UTF-8'')?"?([^";]+)"?/i.exec(contentDisposition) : null;
  if (match) {
    return decodeURIComponent(match[1].trim());
  }
  const path = new URL(url).pathname;
  return decodeURIComponent(path.slice(path.lastIndexOf("/") + 1));
}
