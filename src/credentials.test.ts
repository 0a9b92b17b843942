import { describe, it, expect } from "vitest";
import { PassThrough } from "stream";
import { envOrPromptCredentials, fixedCredentials } from "./credentials.js";

function terminal(typed?: string) {
  const input = new PassThrough();
  const output = new PassThrough();
  if (typed !== undefined) input.write(typed);
  return { input, output };
}

describe("fixedCredentials", () => {
  it("always hands back the same pair", async () => {
    const provider = fixedCredentials("reader", "test-secret");
    expect(await provider()).toEqual({ username: "reader", password: "test-secret" });
  });
});

describe("envOrPromptCredentials", () => {
  it("uses the environment without prompting", async () => {
    const streams = terminal();
    const provider = envOrPromptCredentials({ username: "reader", password: "test-secret" }, streams);

    expect(await provider()).toEqual({ username: "reader", password: "test-secret" });
    expect(streams.output.read()).toBeNull();
  });

  it("reads both answers from piped input", async () => {
    const provider = envOrPromptCredentials({}, terminal("reader\ntest-secret\n"));
    expect(await provider()).toEqual({ username: "reader", password: "test-secret" });
  });

  it("only asks for what the environment leaves out", async () => {
    const provider = envOrPromptCredentials({ username: "reader" }, terminal("test-secret\n"));
    expect(await provider()).toEqual({ username: "reader", password: "test-secret" });
  });

  it("asks again after an empty answer", async () => {
    const provider = envOrPromptCredentials({}, terminal("\n   \nreader\n\ntest-secret\n"));
    expect(await provider()).toEqual({ username: "reader", password: "test-secret" });
  });

  it("rejects when input ends before the password", async () => {
    const streams = terminal("reader\n");
    streams.input.end();
    const provider = envOrPromptCredentials({}, streams);

    await expect(provider()).rejects.toThrow('Input closed before an answer to "Enter your password:"');
  });

  it("rejects when input is already closed", async () => {
    const streams = terminal();
    streams.input.end();
    const provider = envOrPromptCredentials({ password: "test-secret" }, streams);

    await expect(provider()).rejects.toThrow('Input closed before an answer to "Enter your username:"');
  });
});
