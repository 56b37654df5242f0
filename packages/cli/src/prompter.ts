import { createInterface, type Interface } from "node:readline";
import { Writable } from "node:stream";
import type { ConnectionField } from "@cf-deploy/shared-types";
import type { PromptFn } from "./target-resolver.js";

export interface AskOptions {
  /** When true, input is not echoed to the terminal. */
  secret?: boolean;
}

/** Interactive terminal input, injectable so callers can be tested without a TTY. */
export interface Prompter {
  ask(message: string, options?: AskOptions): Promise<string>;
  close(): void;
}

/** Forwards to `target` unless muted; readline echoes typed keys through it. */
class MutableOutput extends Writable {
  muted = false;

  constructor(private readonly target: NodeJS.WritableStream) {
    super();
  }

  override _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void) {
    if (!this.muted) {
      this.target.write(chunk);
    }
    callback();
  }
}

export class ReadlinePrompter implements Prompter {
  private readonly output: MutableOutput;
  private readonly rl: Interface;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    private readonly target: NodeJS.WritableStream = process.stderr,
    terminal = Boolean(process.stdin.isTTY)
  ) {
    this.output = new MutableOutput(target);
    this.rl = createInterface({ input, output: this.output, terminal });
  }

  ask(message: string, options?: AskOptions): Promise<string> {
    if (options?.secret) {
      return this.askSecret(message);
    }
    return new Promise((resolve) => {
      this.rl.question(message, (answer) => resolve(answer.trim()));
    });
  }

  close(): void {
    this.rl.close();
  }

  private askSecret(message: string): Promise<string> {
    this.target.write(message);
    this.output.muted = true;
    return new Promise((resolve) => {
      this.rl.question("", (answer) => {
        this.output.muted = false;
        this.target.write("\n");
        resolve(answer);
      });
    });
  }
}

/**
 * Asks for a value showing `defaultValue` in brackets; an empty answer
 * selects the default.
 */
export async function askWithDefault(prompter: Prompter, label: string, defaultValue: string) {
  const message = defaultValue ? `${label} [${defaultValue}]: ` : `${label}: `;
  const answer = await prompter.ask(message);
  return answer === "" ? defaultValue : answer;
}

export const FIELD_LABELS: Record<ConnectionField, string> = {
  apiUrl: "CF API URL",
  user: "Username",
  password: "Password",
  org: "Organization",
  space: "Space"
};

/** Adapts a `Prompter` to the callback the target resolver takes. */
export function connectionPrompt(prompter: Prompter): PromptFn {
  return ({ field, defaultValue, secret }) =>
    secret
      ? prompter.ask(`${FIELD_LABELS[field]}: `, { secret: true })
      : askWithDefault(prompter, FIELD_LABELS[field], defaultValue);
}
