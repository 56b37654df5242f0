import { PassThrough } from "node:stream";
import { describe, expect, it } from "vitest";
import { askWithDefault, ReadlinePrompter } from "../src/prompter.js";
import { FakePrompter } from "./helpers/fakes.js";

function fakeTerminal() {
  const input = new PassThrough();
  const output = new PassThrough();
  let written = "";
  output.on("data", (chunk: Buffer) => {
    written += chunk.toString();
  });
  const prompter = new ReadlinePrompter(input, output, true);
  return { input, prompter, written: () => written };
}

function flush() {
  return new Promise((resolve) => setImmediate(resolve));
}

describe("ReadlinePrompter", () => {
  it("echoes ordinary answers and hides secret ones", async () => {
    const { input, prompter, written } = fakeTerminal();

    const user = prompter.ask("Username: ");
    input.write("alice\r");
    await expect(user).resolves.toBe("alice");

    const password = prompter.ask("Password: ", { secret: true });
    input.write("test-secret\r");
    await expect(password).resolves.toBe("test-secret");

    prompter.close();
    await flush();

    expect(written()).toContain("alice");
    expect(written()).toContain("Password: ");
    expect(written()).not.toContain("test-secret");
  });
});

describe("askWithDefault", () => {
  it("shows the default in brackets and returns it for an empty answer", async () => {
    const prompter = new FakePrompter([""]);

    await expect(askWithDefault(prompter, "Space", "s1")).resolves.toBe("s1");
    expect(prompter.asked).toEqual([{ message: "Space [s1]: ", secret: false }]);
  });
});
