import { writeFile } from "node:fs/promises";
import { NetworkError } from "../service/common/errors.ts";

export interface HttpClient {
  /**
   * Sends a HEAD request. Any HTTP response counts, whatever its status.
   *
   * @returns the response status code
   * @throws {NetworkError} if no response arrived in time
   */
  head(url: string, options: { timeoutMs: number }): Promise<number>;

  /**
   * Saves the response body to `destination`.
   *
   * @throws {NetworkError} on a network failure, a timeout, or a non-2xx
   * response
   */
  download(
    url: string,
    destination: string,
    options: { timeoutMs: number },
  ): Promise<void>;
}

const asError = (e: unknown) => (e instanceof Error ? e : new Error(String(e)));

export class FetchHttpClient implements HttpClient {
  async head(url: string, { timeoutMs }: { timeoutMs: number }) {
    const res = await fetch(url, {
      method: "HEAD",
      signal: AbortSignal.timeout(timeoutMs),
    }).catch((e) => {
      throw new NetworkError(url, asError(e));
    });
    return res.status;
  }

  async download(
    url: string,
    destination: string,
    { timeoutMs }: { timeoutMs: number },
  ) {
    try {
      const res = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
      if (!res.ok) {
        throw new Error(`HTTP ${res.status} ${res.statusText}`.trimEnd());
      }
      await writeFile(destination, Buffer.from(await res.arrayBuffer()));
    } catch (e) {
      throw new NetworkError(url, asError(e));
    }
  }
}
