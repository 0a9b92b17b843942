import * as cheerio from "cheerio";
import { AuthTokenMissingError, LoginRejectedError } from "./errors.js";
import { sleep, type HttpClient } from "./http.js";
import type { CredentialsProvider } from "./credentials.js";

export interface SessionHandle {
  client: HttpClient;
  username: string;
}

export interface SessionOptions {
  baseUrl: string;
  loginDelayMs: number;
  sleep?: (ms: number) => Promise<void>;
}

export function loginUrl(baseUrl: string): string {
  return `${baseUrl}/users/login`;
}

export async function getCsrfToken(client: HttpClient, baseUrl: string): Promise<string> {
  const url = loginUrl(baseUrl);
  const html = await client.getText(url);
  const $ = cheerio.load(html);
  const token = $('meta[name="csrf-token"]').attr("content");
  if (!token) {
    throw new AuthTokenMissingError(url);
  }
  return token;
}

export async function signIn(
  client: HttpClient,
  baseUrl: string,
  token: string,
  username: string,
  password: string
): Promise<void> {
  const url = loginUrl(baseUrl);
  const response = await client.postForm(
    url,
    {
      utf8: "✓",
      authenticity_token: token,
      "user[login]": username,
      "user[password]": password,
      commit: "Log in",
    },
    {
      referer: url,
      origin: baseUrl,
    }
  );

  await response.body?.cancel();
  if (!response.ok) {
    throw new LoginRejectedError(username, response.status);
  }
}

/**
 * Logs in once; the session lives on in `client`'s cookie jar, which every
 * later page fetch reuses.
 */
export async function acquireSession(
  client: HttpClient,
  credentials: CredentialsProvider,
  options: SessionOptions
): Promise<SessionHandle> {
  const wait = options.sleep ?? sleep;

  console.log("Getting CSRF token...");
  const token = await getCsrfToken(client, options.baseUrl);
  await wait(options.loginDelayMs);

  const { username, password } = await credentials();
  console.log("Logging in...");
  await signIn(client, options.baseUrl, token, username, password);
  console.log(`Logged in as ${username}`);

  return { client, username };
}
