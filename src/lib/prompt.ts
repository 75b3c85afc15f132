import * as readline from "readline/promises";

/**
 * Asks one question on the terminal. The interface only lives for the question,
 * so stdin leaves raw mode afterwards and Ctrl+C reaches the process again.
 * Ctrl+C during the question rejects with an AbortError.
 */
export async function promptLine(
  question: string,
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Promise<string> {
  const rl = readline.createInterface({ input, output });
  const interrupted = new AbortController();
  rl.on("SIGINT", () => interrupted.abort());
  try {
    return await rl.question(question, { signal: interrupted.signal });
  } finally {
    rl.close();
  }
}
