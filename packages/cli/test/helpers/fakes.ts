import type { CfCurlTransport, CurlRequest } from "../../src/cf-cli.js";
import type { CommandResult, CommandRunner, RunOptions } from "../../src/command-runner.js";
import type { AskOptions, Prompter } from "../../src/prompter.js";

export interface RecordedRun {
  command: string;
  args: string[];
  options?: RunOptions;
}

/** Answers commands from a handler and records every invocation. */
export class FakeRunner implements CommandRunner {
  readonly calls: RecordedRun[] = [];

  constructor(
    private readonly handler: (command: string, args: string[]) => Partial<CommandResult> = () => ({})
  ) {}

  async run(command: string, args: string[], options?: RunOptions): Promise<CommandResult> {
    this.calls.push({ command, args, options });
    const result = this.handler(command, args);
    return { exitCode: 0, stdout: "", stderr: "", ...result };
  }
}

export interface RecordedCurl {
  path: string;
  method: string;
  body?: string;
}

/** In-process CF API: responses keyed by `METHOD path`. */
export class FakeTransport implements CfCurlTransport {
  readonly calls: RecordedCurl[] = [];
  private readonly responses = new Map<string, string>();

  on(method: string, path: string, response: unknown) {
    this.responses.set(`${method} ${path}`, typeof response === "string" ? response : JSON.stringify(response));
    return this;
  }

  async curl(path: string, request: CurlRequest = {}): Promise<string> {
    const method = request.method ?? "GET";
    this.calls.push({ path, method, body: request.body });
    const response = this.responses.get(`${method} ${path}`);
    if (response === undefined) {
      throw new Error(`unexpected ${method} ${path}`);
    }
    return response;
  }
}

/** Replays scripted answers and records the prompts it was shown. */
export class FakePrompter implements Prompter {
  readonly asked: Array<{ message: string; secret: boolean }> = [];
  closed = false;

  constructor(private readonly answers: string[] = []) {}

  async ask(message: string, options?: AskOptions): Promise<string> {
    this.asked.push({ message, secret: options?.secret ?? false });
    return this.answers.shift() ?? "";
  }

  close() {
    this.closed = true;
  }
}

export function resource<E>(guid: string, entity: E, url = `/v2/resources/${guid}`) {
  return { metadata: { guid, url }, entity };
}
