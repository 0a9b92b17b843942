import { describe, it, expect } from "vitest";
import { HttpStatusError } from "./errors.js";
import { HttpClient, type FetchFn } from "./http.js";

interface Call {
  url: string;
  method: string;
  headers: Headers;
  body: unknown;
}

function recorder(respond: (call: Call) => Response) {
  const calls: Call[] = [];
  const fetch: FetchFn = async (url, init) => {
    const call = {
      url,
      method: init.method ?? "GET",
      headers: new Headers(init.headers),
      body: init.body,
    };
    calls.push(call);
    return respond(call);
  };
  return { fetch, calls };
}

describe("HttpClient", () => {
  it("sends its user agent", async () => {
    const { fetch, calls } = recorder(() => new Response("ok"));
    const client = new HttpClient({ userAgent: "Wrapped/test", fetch });

    expect(await client.getText("https://archive.example.org/")).toBe("ok");
    expect(calls[0].headers.get("user-agent")).toBe("Wrapped/test");
  });

  it("stores cookies and sends them back", async () => {
    const { fetch, calls } = recorder((call) =>
      call.url.endsWith("/first")
        ? new Response("", { headers: { "set-cookie": "_session=abc; path=/; HttpOnly" } })
        : new Response("")
    );
    const client = new HttpClient({ userAgent: "test-agent", fetch });

    await client.getText("https://archive.example.org/first");
    await client.getText("https://archive.example.org/second");

    expect(calls[0].headers.get("cookie")).toBeNull();
    expect(calls[1].headers.get("cookie")).toBe("_session=abc");
  });

  it("follows a redirect after a form post as a GET, keeping cookies from every hop", async () => {
    const { fetch, calls } = recorder((call) => {
      if (call.method === "POST") {
        return new Response(null, {
          status: 302,
          headers: { location: "/welcome", "set-cookie": "user_credentials=1; path=/" },
        });
      }
      return new Response("welcome");
    });
    const client = new HttpClient({ userAgent: "test-agent", fetch });

    const response = await client.postForm("https://archive.example.org/login", { name: "reader" });

    expect(await response.text()).toBe("welcome");
    expect(calls.map((c) => [c.method, c.url])).toEqual([
      ["POST", "https://archive.example.org/login"],
      ["GET", "https://archive.example.org/welcome"],
    ]);
    expect(calls[0].body).toBe("name=reader");
    expect(calls[0].headers.get("content-type")).toBe("application/x-www-form-urlencoded");
    expect(calls[1].body).toBeUndefined();
    expect(calls[1].headers.get("cookie")).toBe("user_credentials=1");
  });

  it("keeps the method on a 307", async () => {
    const { fetch, calls } = recorder((call) =>
      call.url.endsWith("/old")
        ? new Response(null, { status: 307, headers: { location: "https://archive.example.org/new" } })
        : new Response("moved")
    );
    const client = new HttpClient({ userAgent: "test-agent", fetch });

    await client.postForm("https://archive.example.org/old", { a: "1" });

    expect(calls.map((c) => c.method)).toEqual(["POST", "POST"]);
    expect(calls[1].body).toBe("a=1");
  });

  it("gives up on redirect loops", async () => {
    const { fetch } = recorder(() => new Response(null, { status: 302, headers: { location: "/loop" } }));
    const client = new HttpClient({ userAgent: "test-agent", fetch, maxRedirects: 3 });

    await expect(client.request("https://archive.example.org/loop")).rejects.toThrow(
      "Too many redirects starting at https://archive.example.org/loop"
    );
  });

  it("raises HttpStatusError for non-2xx responses", async () => {
    const { fetch } = recorder(() => new Response("busy", { status: 429 }));
    const client = new HttpClient({ userAgent: "test-agent", fetch });

    const failure = client.getText("https://archive.example.org/users/reader/readings?page=1");
    await expect(failure).rejects.toBeInstanceOf(HttpStatusError);
    await expect(failure).rejects.toMatchObject({
      status: 429,
      message: "HTTP 429 for https://archive.example.org/users/reader/readings?page=1",
    });
  });

  it("discards the bodies of redirects and failed responses", async () => {
    const cancelled: string[] = [];
    const openBody = (url: string) =>
      new ReadableStream<Uint8Array>({
        cancel() {
          cancelled.push(url);
        },
      });
    const { fetch } = recorder((call) => {
      if (call.url.endsWith("/moved")) {
        return new Response(openBody(call.url), { status: 301, headers: { location: "/busy" } });
      }
      return new Response(openBody(call.url), { status: 503 });
    });
    const client = new HttpClient({ userAgent: "test-agent", fetch });

    await expect(client.getText("https://archive.example.org/moved")).rejects.toBeInstanceOf(
      HttpStatusError
    );
    expect(cancelled).toEqual(["https://archive.example.org/moved", "https://archive.example.org/busy"]);
  });
});
