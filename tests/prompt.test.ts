import { PassThrough } from "stream";
import { describe, expect, it } from "vitest";
import { promptLine } from "../src/lib/prompt";

describe("promptLine", () => {
  it("returns one answer and lets go of the input", async () => {
    const input = new PassThrough();
    const answer = promptLine("Path: ", input, new PassThrough());
    input.write("pages/list.html\n");

    expect(await answer).toBe("pages/list.html");
    expect(input.listenerCount("data")).toBe(0);
  });

  it("asks again on the same input", async () => {
    const input = new PassThrough();
    const first = promptLine("Path: ", input, new PassThrough());
    input.write("first.html\n");
    expect(await first).toBe("first.html");

    const second = promptLine("Path: ", input, new PassThrough());
    input.write("second.html\n");
    expect(await second).toBe("second.html");
  });

  it("rejects with an AbortError on Ctrl+C at a terminal", async () => {
    const input = new PassThrough();
    const output = Object.assign(new PassThrough(), { isTTY: true });
    const answer = promptLine("Path: ", input, output);
    input.write("\x03");

    await expect(answer).rejects.toMatchObject({ name: "AbortError" });
    expect(input.listenerCount("keypress")).toBe(0);
  });
});
