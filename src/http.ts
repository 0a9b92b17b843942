import { CookieJar } from "tough-cookie";
import { HttpStatusError } from "./errors.js";

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export interface HttpClientOptions {
  userAgent: string;
  fetch?: FetchFn;
  jar?: CookieJar;
  maxRedirects?: number;
}

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

/**
 * fetch with a cookie jar. Redirects are followed here rather than by fetch
 * so that cookies set on every hop (the login POST answers with a 302) land
 * in the jar.
 */
export class HttpClient {
  readonly jar: CookieJar;
  private readonly userAgent: string;
  private readonly fetchFn: FetchFn;
  private readonly maxRedirects: number;

  constructor(options: HttpClientOptions) {
    this.userAgent = options.userAgent;
    this.fetchFn = options.fetch ?? ((url, init) => fetch(url, init));
    this.jar = options.jar ?? new CookieJar();
    this.maxRedirects = options.maxRedirects ?? 10;
  }

  async request(url: string, init: RequestInit = {}): Promise<Response> {
    let currentUrl = url;
    let method = init.method ?? "GET";
    let body = init.body;

    for (let hop = 0; hop <= this.maxRedirects; hop++) {
      const headers = new Headers(init.headers);
      headers.set("user-agent", this.userAgent);
      const cookies = await this.jar.getCookieString(currentUrl);
      if (cookies) headers.set("cookie", cookies);

      const response = await this.fetchFn(currentUrl, {
        ...init,
        method,
        headers,
        body,
        redirect: "manual",
      });

      for (const cookie of response.headers.getSetCookie()) {
        await this.jar.setCookie(cookie, currentUrl, { ignoreError: true });
      }

      const location = response.headers.get("location");
      if (!REDIRECT_STATUSES.has(response.status) || !location) {
        return response;
      }
      await response.body?.cancel();

      // 303 always, and 301/302 in practice, switch a POST to a GET
      if (response.status === 303 || (response.status <= 302 && method === "POST")) {
        method = "GET";
        body = undefined;
      }
      currentUrl = new URL(location, currentUrl).toString();
    }

    throw new Error(`Too many redirects starting at ${url}`);
  }

  async getText(url: string): Promise<string> {
    const response = await this.request(url);
    if (!response.ok) {
      await response.body?.cancel();
      throw new HttpStatusError(response.status, url);
    }
    return response.text();
  }

  async postForm(
    url: string,
    fields: Record<string, string>,
    headers: Record<string, string> = {}
  ): Promise<Response> {
    return this.request(url, {
      method: "POST",
      headers: {
        ...headers,
        "content-type": "application/x-www-form-urlencoded",
      },
      body: new URLSearchParams(fields).toString(),
    });
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
