import readline from "readline";
import { Writable, type Readable } from "stream";
import type { Credentials } from "./types.js";

export type CredentialsProvider = () => Credentials | Promise<Credentials>;

export interface PromptStreams {
  input: Readable & { isTTY?: boolean };
  output: Writable;
}

export function fixedCredentials(username: string, password: string): CredentialsProvider {
  return () => ({ username, password });
}

/**
 * One readline interface for every question, so lines that arrive together
 * (piped input) are all read off the same buffer.
 */
function createPrompter(streams: PromptStreams) {
  let muted = false;
  // Echoes the prompt, swallows the typed password
  const echo = new Writable({
    write(chunk, encoding, callback) {
      if (!muted) streams.output.write(chunk, encoding);
      callback();
    },
  });

  const rl = readline.createInterface({
    input: streams.input,
    output: echo,
    terminal: streams.input.isTTY === true,
  });
  const lines = rl[Symbol.asyncIterator]();
  let closed = false;
  rl.on("close", () => {
    closed = true;
  });

  async function ask(question: string, secret: boolean): Promise<string> {
    for (;;) {
      if (!closed) {
        rl.setPrompt(question);
        rl.prompt();
      }
      muted = secret;
      const line = await lines.next();
      muted = false;
      if (secret) streams.output.write("\n");

      if (line.done) {
        throw new Error(`Input closed before an answer to "${question.trim()}"`);
      }
      const answer = line.value.trim();
      if (answer) return answer;
    }
  }

  return {
    ask,
    close: () => {
      if (!closed) rl.close();
    },
  };
}

/** Environment first, then the terminal. */
export function envOrPromptCredentials(
  env: { username?: string; password?: string },
  streams: PromptStreams = { input: process.stdin, output: process.stdout }
): CredentialsProvider {
  return async () => {
    if (env.username && env.password) {
      return { username: env.username, password: env.password };
    }

    const prompter = createPrompter(streams);
    try {
      const username = env.username || (await prompter.ask("Enter your username: ", false));
      const password = env.password || (await prompter.ask("Enter your password: ", true));
      return { username, password };
    } finally {
      prompter.close();
    }
  };
}
