import { describe, it, expect } from "vitest";
import { PassThrough } from "node:stream";
import { createConsoleIO } from "../report/io.js";

function streams(): { input: PassThrough; output: PassThrough; written: () => string } {
  const input = new PassThrough();
  const output = new PassThrough();
  return { input, output, written: () => String(output.read() ?? "") };
}

describe("createConsoleIO", () => {
  it("answers each prompt from piped lines that arrive together", async () => {
    const { input, output } = streams();
    const io = createConsoleIO(input, output);
    input.end("3\n2\nq\n");

    const answers: Array<string | null> = [];
    for (let i = 0; i < 4; i++) answers.push(await io.prompt("> "));

    expect(answers).toEqual(["3", "2", "q", null]);
  });

  it("resolves a waiting prompt with null when closed", async () => {
    const { input, output } = streams();
    const io = createConsoleIO(input, output);

    const answer = io.prompt("> ");
    io.close();

    expect(await answer).toBeNull();
    expect(await io.prompt("> ")).toBeNull();
  });

  it("writes lines and reports a default width off a terminal", () => {
    const { input, output, written } = streams();
    const io = createConsoleIO(input, output);

    io.write("hello");
    io.clear();

    expect(written()).toBe("hello\n");
    expect(io.columns()).toBe(80);
  });
});
