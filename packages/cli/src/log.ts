const PREFIX = "[cf-deploy]";

let verbose = process.env.CF_DEPLOY_VERBOSE === "1";

export function setVerbose(enabled: boolean) {
  verbose = enabled;
}

export function info(message: string) {
  process.stderr.write(`${PREFIX} ${message}\n`);
}

export function debug(message: string) {
  if (verbose) {
    process.stderr.write(`${PREFIX} ${message}\n`);
  }
}

/** Renders a command line for logs and errors with the value after `-p` hidden. */
export function redactArgs(args: readonly string[]) {
  return args.map((arg, index) => (index > 0 && args[index - 1] === "-p" ? "****" : arg));
}
