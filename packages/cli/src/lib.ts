export * from './cf-api.js';
export * from './cf-cli.js';
export * from './command-runner.js';
export * from './config.js';
export * from './deploy.js';
export * from './domain.js';
export * from './errors.js';
export * from './gearpump.js';
export * from './payload.js';
export * from './prompter.js';
export * from './target-resolver.js';
export * from './uploader.js';
export { createDeployProgram, createProgram, type ProgramDeps } from './program.js';
