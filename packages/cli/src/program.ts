import { resolve } from 'node:path';
import { Command } from 'commander';
import type { ConnectionParameters, DeployConfig } from '@cf-deploy/shared-types';
import { CfApiClient } from './cf-api.js';
import { CfCli } from './cf-cli.js';
import { SpawnCommandRunner, type CommandRunner } from './command-runner.js';
import { readConfig, resolveRuntimeConfig } from './config.js';
import { collectTarget, deployApplication } from './deploy.js';
import { ValidationError } from './errors.js';
import { deployToGearpump, gearpumpLogin } from './gearpump.js';
import { setVerbose } from './log.js';
import { renderOutput, type OutputMode } from './output.js';
import { parseUsersArgs, prepareSubmitPayload } from './payload.js';
import { askWithDefault, ReadlinePrompter, type Prompter } from './prompter.js';
import { uploadToHdfs } from './uploader.js';

interface GlobalOptions {
  json?: boolean;
  human?: boolean;
  verbose?: boolean;
  cfBinary?: string;
}

interface ConnectionOptions {
  apiUrl?: string;
  user?: string;
  password?: string;
  org?: string;
  space?: string;
}

/** Seams for running the program in-process, e.g. from tests or a custom deployment script. */
export interface ProgramDeps {
  runner?: CommandRunner;
  createPrompter?: () => Prompter;
  env?: NodeJS.ProcessEnv;
  fileConfig?: DeployConfig;
  stdout?: (text: string) => void;
}

function pickOutputMode(options: GlobalOptions): OutputMode {
  if (options.human) {
    return 'human';
  }
  if (options.json) {
    return 'json';
  }
  if (!process.stdout.isTTY) {
    return 'json';
  }
  return 'human';
}

function collect(value: string, previous: string[]) {
  return [...previous, value];
}

function connectionOverrides(options: ConnectionOptions): Partial<ConnectionParameters> {
  return {
    apiUrl: options.apiUrl,
    user: options.user,
    password: options.password,
    org: options.org,
    space: options.space,
  };
}

function addConnectionOptions(command: Command, appName?: string) {
  const scope = appName ? ` in which ${appName} will be deployed` : '';
  return command
    .option('--api-url <url>', 'CF API URL, e.g. https://api.example.com (a bare base domain works too)')
    .option('--user <user>', 'CF username')
    .option('--password <password>', 'CF password')
    .option('--org <org>', `Organization${scope}`)
    .option('--space <space>', `Space${scope}`);
}

function createRuntime(global: GlobalOptions, deps: ProgramDeps) {
  if (global.verbose) {
    setVerbose(true);
  }
  const config = resolveRuntimeConfig(
    { cfBinary: global.cfBinary },
    deps.env ?? process.env,
    deps.fileConfig ?? readConfig(),
  );
  const runner = deps.runner ?? new SpawnCommandRunner();
  const cf = new CfCli(runner, config.cfBinary);
  const api = new CfApiClient(cf, { tempKeyName: config.tempKeyName });
  return { config, runner, cf, api };
}

async function withPrompter<T>(deps: ProgramDeps, use: (prompter: Prompter) => Promise<T>) {
  const prompter = deps.createPrompter ? deps.createPrompter() : new ReadlinePrompter();
  try {
    return await use(prompter);
  } finally {
    prompter.close();
  }
}

function globalsOf(command: Command): GlobalOptions {
  let root = command;
  while (root.parent) {
    root = root.parent;
  }
  return root.opts<GlobalOptions>();
}

/**
 * Argument parser and runner for a deployment script of a single
 * application: `--app-name` defaults to `appName` and the project directory
 * to the current one.
 */
export function createDeployProgram(appName: string, deps: ProgramDeps = {}) {
  const program = new Command();
  addConnectionOptions(program.name(`deploy-${appName}`).description(`Deployment script for ${appName}`), appName)
    .option('--app-name <name>', 'Application name', appName)
    .option('--project-dir <dir>', 'Directory containing application manifest')
    .option('--skip-build', 'Skip `mvn clean package`')
    .option('--push-options <args>', 'Extra arguments for `cf push`')
    .option('--verbose', 'Log every command that runs')
    .option('--cf-binary <path>', 'Path to the cf CLI')
    .action(
      async (options: ConnectionOptions & GlobalOptions & {
        appName: string;
        projectDir?: string;
        skipBuild?: boolean;
        pushOptions?: string;
      }) => {
        const runtime = createRuntime(options, deps);
        await withPrompter(deps, (prompter) =>
          deployApplication({
            cf: runtime.cf,
            runner: runtime.runner,
            prompter,
            overrides: connectionOverrides(options),
            appName: options.appName,
            projectDir: resolve(options.projectDir ?? process.cwd()),
            skipBuild: options.skipBuild,
            pushArgs: options.pushOptions?.split(/\s+/).filter(Boolean),
            mavenBinary: runtime.config.mavenBinary,
          }),
        );
      },
    );
  return program;
}

export function createProgram(deps: ProgramDeps = {}) {
  const program = new Command();
  const print = (command: string, data: unknown, global: GlobalOptions) => {
    const text = renderOutput(command, data, pickOutputMode(global));
    if (deps.stdout) {
      deps.stdout(text);
      return;
    }
    console.log(text);
  };

  program
    .name('cf-deploy')
    .description('Deploy applications to Cloud Foundry and submit them to Gearpump')
    .version(process.env.npm_package_version ?? '0.1.0')
    .option('--json', 'Render machine-parseable JSON output')
    .option('--human', 'Render human-readable output')
    .option('--verbose', 'Log every command that runs')
    .option('--cf-binary <path>', 'Path to the cf CLI');

  program.addHelpText(
    'after',
    '\nMissing connection values are prompted for, with the active `cf target` values as defaults.\nEnv overrides: `CF_DEPLOY_CF_BINARY`, `CF_DEPLOY_MAVEN_BINARY`, `CF_DEPLOY_TEMP_KEY_NAME`, `CF_DEPLOY_VERBOSE`.',
  );

  addConnectionOptions(
    program.command('target').description('Log in and select org/space when the requested target differs'),
  ).action(async (options: ConnectionOptions, command: Command) => {
    const global = globalsOf(command);
    const runtime = createRuntime(global, deps);
    const decision = await withPrompter(deps, async (prompter) => {
      const resolved = await collectTarget(runtime.cf, connectionOverrides(options), prompter);
      await runtime.cf.apply(resolved);
      return resolved;
    });
    print(
      'target',
      {
        api_url: decision.params.apiUrl,
        user: decision.params.user,
        org: decision.params.org,
        space: decision.params.space,
        login_required: decision.loginRequired,
        target_required: decision.targetRequired,
      },
      global,
    );
  });

  addConnectionOptions(program.command('deploy <app-name>').description('Build an application and push it'))
    .option('--project-dir <dir>', 'Directory containing application manifest')
    .option('--skip-build', 'Skip `mvn clean package`')
    .option('--push-options <args>', 'Extra arguments for `cf push`')
    .action(
      async (
        appName: string,
        options: ConnectionOptions & { projectDir?: string; skipBuild?: boolean; pushOptions?: string },
        command: Command,
      ) => {
        const global = globalsOf(command);
        const runtime = createRuntime(global, deps);
        const decision = await withPrompter(deps, (prompter) =>
          deployApplication({
            cf: runtime.cf,
            runner: runtime.runner,
            prompter,
            overrides: connectionOverrides(options),
            appName,
            projectDir: resolve(options.projectDir ?? process.cwd()),
            skipBuild: options.skipBuild,
            pushArgs: options.pushOptions?.split(/\s+/).filter(Boolean),
            mavenBinary: runtime.config.mavenBinary,
          }),
        );
        print('deploy', { app: appName, org: decision.params.org, space: decision.params.space }, global);
      },
    );

  program
    .command('instances')
    .description('List service instances in the targeted space')
    .action(async (_options: unknown, command: Command) => {
      const global = globalsOf(command);
      const { api } = createRuntime(global, deps);
      const instances = await api.listServiceInstances();
      print(
        'instances',
        instances.map((resource) => ({ name: resource.entity.name, guid: resource.metadata.guid })),
        global,
      );
    });

  program
    .command('instance-guid <name>')
    .description('Print the GUID of a service instance')
    .action(async (name: string, _options: unknown, command: Command) => {
      const global = globalsOf(command);
      const { api } = createRuntime(global, deps);
      print('instance-guid', { name, guid: await api.findInstanceGuidByName(name) }, global);
    });

  program
    .command('credentials <instance>')
    .description('Read the credentials of a service instance through a temporary service key')
    .option('--key-name <name>', 'Name of the temporary service key')
    .action(async (instance: string, options: { keyName?: string }, command: Command) => {
      const global = globalsOf(command);
      const { api } = createRuntime(global, deps);
      print('credentials', await api.createEphemeralCredential(instance, options.keyName), global);
    });

  program
    .command('bind <instance> <app-guid>')
    .description('Bind a service instance to an application')
    .action(async (instance: string, appGuid: string, _options: unknown, command: Command) => {
      const global = globalsOf(command);
      const { api } = createRuntime(global, deps);
      const binding = await api.createServiceBinding(await api.findInstanceGuidByName(instance), appGuid);
      print('bind', { guid: binding.metadata.guid, url: binding.metadata.url }, global);
    });

  program
    .command('upload <file>')
    .description('Upload a file to HDFS through the platform uploader')
    .requiredOption('--title <title>', 'Target HDFS file name')
    .option('--category <category>', 'File category', 'other')
    .option('--org <org>', 'Organization the file belongs to (default: targeted org)')
    .option('--api-url <url>', 'CF API URL (default: targeted API)')
    .action(
      async (
        file: string,
        options: { title: string; category: string; org?: string; apiUrl?: string },
        command: Command,
      ) => {
        const global = globalsOf(command);
        const { cf } = createRuntime(global, deps);
        const current = await cf.getTarget();
        const apiUrl = options.apiUrl ?? current?.apiUrl;
        const orgName = options.org ?? current?.org;
        if (!apiUrl || !orgName) {
          throw new ValidationError('No API URL or org: pass --api-url and --org or log in first');
        }
        const path = await uploadToHdfs({
          cf,
          apiUrl,
          orgName,
          filePath: resolve(file),
          title: options.title,
          category: options.category,
        });
        print('upload', { path }, global);
      },
    );

  program
    .command('gearpump-login <gearpump-url>')
    .description('Log in to a Gearpump instance and keep its session for the next submission')
    .option('--username <username>', 'Gearpump admin username')
    .option('--password <password>', 'Gearpump admin password')
    .action(
      async (gearpumpUrl: string, options: { username?: string; password?: string }, command: Command) => {
        const global = globalsOf(command);
        if (global.verbose) {
          setVerbose(true);
        }
        const credentials = await withPrompter(deps, async (prompter) => ({
          username: options.username || (await askWithDefault(prompter, 'Gearpump username', '')),
          password: options.password || (await prompter.ask('Gearpump password: ', { secret: true })),
        }));
        const response = await gearpumpLogin(gearpumpUrl, credentials.username, credentials.password);
        print('gearpump-login', { response }, global);
      },
    );

  program
    .command('gearpump-payload <instances...>')
    .description('Print the submitapp request body built from service instances')
    .option('--arg <key=value>', 'User argument (repeatable)', collect, [])
    .action(async (instances: string[], options: { arg: string[] }, command: Command) => {
      const global = globalsOf(command);
      const { api } = createRuntime(global, deps);
      print('gearpump-payload', await prepareSubmitPayload(api, instances, parseUsersArgs(options.arg)), global);
    });

  program
    .command('gearpump-submit <gearpump-url> <jar>')
    .description('Submit a jar to Gearpump, bound to the given service instances')
    .option('--instance <name>', 'Service instance to pass to the application (repeatable)', collect, [])
    .option('--arg <key=value>', 'User argument (repeatable)', collect, [])
    .action(
      async (gearpumpUrl: string, jar: string, options: { instance: string[]; arg: string[] }, command: Command) => {
        const global = globalsOf(command);
        const { api } = createRuntime(global, deps);
        const response = await deployToGearpump({
          api,
          gearpumpUrl,
          jarPath: resolve(jar),
          instances: options.instance,
          usersArgs: parseUsersArgs(options.arg),
        });
        print('gearpump-submit', { response }, global);
      },
    );

  return program;
}
